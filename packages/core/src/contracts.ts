import { z } from 'zod';

// ============================================================================
// Category Table Schemas
// ============================================================================

/**
 * A category name becomes a folder directly under the root, so it must be a
 * single path segment.
 */
export const CategoryNameSchema = z
  .string()
  .trim()
  .min(1, 'category name must not be empty')
  .refine((name) => !/[/\\]/.test(name), 'category name must not contain path separators')
  .refine((name) => name !== '.' && name !== '..', 'category name must not be "." or ".."');

/**
 * Extensions are stored lowercase with a leading dot (".pdf").
 * "PDF" and ".Pdf" are accepted and normalized.
 */
export const ExtensionSchema = z
  .string()
  .trim()
  .min(1, 'extension must not be empty')
  .refine((ext) => ext !== '.', 'extension must not be a bare dot')
  .transform((ext) => {
    const lower = ext.toLowerCase();
    return lower.startsWith('.') ? lower : `.${lower}`;
  });

export const CategoryDefinitionSchema = z.object({
  name: CategoryNameSchema,
  extensions: z.array(ExtensionSchema),
});

export type CategoryDefinition = z.infer<typeof CategoryDefinitionSchema>;

/**
 * Tables are written either as an ordered list of definitions or as an object
 * mapping category name to extensions (key order is table order).
 */
export const CategoryListInputSchema = z.array(CategoryDefinitionSchema);

export const CategoryRecordInputSchema = z
  .record(z.string(), z.array(ExtensionSchema))
  .transform((record) => Object.entries(record).map(([name, extensions]) => ({ name, extensions })))
  .pipe(CategoryListInputSchema);

export interface CategoryEntry {
  readonly name: string;
  readonly extensions: readonly string[];
}

/** Validated, frozen table. Order is folder-creation and listing order. */
export type CategoryTable = readonly CategoryEntry[];

export const DuplicatePolicySchema = z.enum(['last-wins', 'first-wins', 'error']);

export type DuplicatePolicy = z.infer<typeof DuplicatePolicySchema>;

// ============================================================================
// Organizer Types
// ============================================================================

export interface OrganizeOptions {
  simulate?: boolean;
}

export type MoveAction = 'moved' | 'would-move' | 'skipped-same-location' | 'skipped-error';

export interface MoveDecision {
  source: string;
  fileName: string;
  category: string;
  destination: string; // after collision resolution
  action: MoveAction;
  error?: string; // set for skipped-error
}

export interface OrganizeSummary {
  root: string;
  simulated: boolean;
  moved: number;
  skipped: number;
  planned: number; // would-move count in simulate mode, 0 otherwise
  decisions: MoveDecision[];
}

// ============================================================================
// Listing Types
// ============================================================================

export interface CategoryFiles {
  category: string;
  files: string[];
}

export interface CategoryListing {
  root: string;
  categories: CategoryFiles[];
  total: number;
}
