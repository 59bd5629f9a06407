import { z } from 'zod';
import { LifeCategorySchema } from '../shared/schemas/commonSchemas';

/**
 * Decoders for JSON text columns. Rows are validated on the way out so a
 * hand-edited database surfaces as an error instead of a mistyped entity.
 */

const StringListColumn = z.array(z.string());
const NumberMapColumn = z.record(z.string(), z.number());
const BooleanMapColumn = z.record(z.string(), z.boolean());
const CategoryListColumn = z.array(LifeCategorySchema);
const CategoryRatingsColumn = z.record(LifeCategorySchema, z.number());

function parseJsonColumn<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, text: string | null, fallback: T): T {
  if (!text) {
    return fallback;
  }
  return schema.parse(JSON.parse(text));
}

export const readStringList = (text: string | null): string[] =>
  parseJsonColumn(StringListColumn, text, []);

export const readNumberMap = (text: string | null): Record<string, number> =>
  parseJsonColumn(NumberMapColumn, text, {});

export const readBooleanMap = (text: string | null): Record<string, boolean> =>
  parseJsonColumn(BooleanMapColumn, text, {});

export const readCategoryList = (text: string | null) =>
  parseJsonColumn(CategoryListColumn, text, []);

export const readCategoryRatings = (text: string | null) =>
  parseJsonColumn(CategoryRatingsColumn, text, {});

export function writeJson(value: unknown): string {
  return JSON.stringify(value);
}

/** SQLite has no boolean type. */
export const toSqlBoolean = (value: boolean): number => (value ? 1 : 0);
export const fromSqlBoolean = (value: number): boolean => value !== 0;
