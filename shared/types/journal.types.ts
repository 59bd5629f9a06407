/** The journal entry for one calendar day. Writing the same date again replaces it. */
export interface DailyEntry {
  date: string; // yyyy-MM-dd, identity

  completedHabits: string[]; // habit ids
  goalProgress: Record<string, number>; // goal id -> progress delta

  // Reflection and planning
  dailyWins: string[];
  challengesFaced: string[];
  lessonsLearned: string[];
  gratitudeItems: string[];

  // Wellness, 1-10 scales
  energyLevel: number | null;
  moodRating: number | null;
  stressLevel: number | null;
  sleepHours: number | null;
  exerciseMinutes: number | null;

  tomorrowPriorities: string[];
  notes: string;
  createdAt: string; // ISO 8601 timestamp
}
