// Central export point for all types

export * from '../constants/lifeDomains';

// Entity types
export * from './goal.types';
export * from './habit.types';
export * from './journal.types';
export * from './assessment.types';
export * from './profile.types';

// Engine output types
export * from './intelligence.types';

// Storage types
export * from './store.types';
