import * as fs from 'fs';
import type { ZodError } from 'zod';
import defaultCategories from './default-categories.json';
import { FALLBACK_CATEGORY } from '../constants';
import { ConfigError, describeError } from '../errors';
import {
  CategoryListInputSchema,
  CategoryRecordInputSchema,
  type CategoryDefinition,
  type CategoryTable,
} from '../contracts';

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function freezeTable(definitions: CategoryDefinition[]): CategoryTable {
  return Object.freeze(
    definitions.map((definition) =>
      Object.freeze({ name: definition.name, extensions: Object.freeze([...definition.extensions]) })
    )
  );
}

/**
 * Validates a category table from untrusted JSON.
 *
 * Accepts `[{ name, extensions }]` or `{ [name]: extensions }`. Extensions are
 * lowercased and given a leading dot. The fallback category is appended when
 * the table does not name it. The result is frozen.
 *
 * Duplicate extensions across categories are NOT rejected here; the classifier
 * applies its duplicate policy to them.
 */
export function parseCategoryTable(input: unknown, source = 'category table'): CategoryTable {
  const schema = Array.isArray(input) ? CategoryListInputSchema : CategoryRecordInputSchema;
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}: ${formatIssues(result.error)}`);
  }

  const definitions = result.data;
  const seen = new Set<string>();
  for (const definition of definitions) {
    if (seen.has(definition.name)) {
      throw new ConfigError(`Invalid ${source}: duplicate category "${definition.name}"`);
    }
    seen.add(definition.name);
  }

  if (!seen.has(FALLBACK_CATEGORY)) {
    definitions.push({ name: FALLBACK_CATEGORY, extensions: [] });
  }

  return freezeTable(definitions);
}

/**
 * Reads and validates a category table from a JSON file.
 */
export function loadCategoryTable(filePath: string): CategoryTable {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read category table ${filePath}: ${describeError(error)}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Category table ${filePath} is not valid JSON: ${describeError(error)}`, { cause: error });
  }

  return parseCategoryTable(parsed, `category table ${filePath}`);
}

/**
 * Built-in table. Contains the reference policy's overlapping entries:
 * .xls/.xlsx (Documents, Spreadsheets) and .ppt/.pptx (Documents, Presentations).
 */
export const DEFAULT_CATEGORY_TABLE: CategoryTable = parseCategoryTable(defaultCategories, 'default category table');
