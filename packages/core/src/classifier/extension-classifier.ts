import { FALLBACK_CATEGORY } from '../constants';
import { ConfigError } from '../errors';
import type { CategoryTable, DuplicatePolicy } from '../contracts';
import { DEFAULT_CATEGORY_TABLE } from '../categories/category-table';

/**
 * Splits a file name at its last dot.
 *
 * A leading dot does not start an extension (".env" has none) and neither
 * does a trailing one ("notes." has none). Case is preserved.
 */
export function splitExtension(fileName: string): { stem: string; ext: string } {
  const dot = fileName.lastIndexOf('.');
  if (dot <= 0 || dot === fileName.length - 1) {
    return { stem: fileName, ext: '' };
  }
  return { stem: fileName.slice(0, dot), ext: fileName.slice(dot) };
}

/**
 * Lowercase extension with its leading dot, or '' when the name has none.
 */
export function extensionOf(fileName: string): string {
  return splitExtension(fileName).ext.toLowerCase();
}

export interface ExtensionConflict {
  extension: string;
  /** Categories claiming the extension, in table order. */
  categories: string[];
  winner: string;
}

export interface ClassifierOptions {
  duplicates?: DuplicatePolicy;
}

/**
 * Maps extensions to categories through an index built once from the table.
 * Read-only after construction.
 */
export class ExtensionClassifier {
  readonly table: CategoryTable;
  readonly duplicates: DuplicatePolicy;
  readonly conflicts: readonly ExtensionConflict[];
  private readonly index: ReadonlyMap<string, string>;

  constructor(table: CategoryTable = DEFAULT_CATEGORY_TABLE, options: ClassifierOptions = {}) {
    this.table = table;
    this.duplicates = options.duplicates ?? 'last-wins';

    const index = new Map<string, string>();
    const claims = new Map<string, string[]>();

    for (const { name, extensions } of table) {
      for (const extension of extensions) {
        const claimedBy = claims.get(extension);
        if (!claimedBy) {
          claims.set(extension, [name]);
          index.set(extension, name);
          continue;
        }
        // Same extension listed twice under one category is harmless.
        if (claimedBy.includes(name)) continue;

        if (this.duplicates === 'error') {
          throw new ConfigError(
            `Extension ${extension} is listed under both "${claimedBy[0]}" and "${name}"`
          );
        }
        claimedBy.push(name);
        if (this.duplicates === 'last-wins') {
          index.set(extension, name);
        }
      }
    }

    this.index = index;
    this.conflicts = Object.freeze(
      [...claims.entries()]
        .filter(([, categories]) => categories.length > 1)
        .map(([extension, categories]) => {
          const winner = index.get(extension) ?? FALLBACK_CATEGORY;
          return { extension, categories, winner };
        })
    );
  }

  /** Category names in table order. */
  get categories(): string[] {
    return this.table.map((entry) => entry.name);
  }

  /**
   * Category for an extension such as ".pdf". Unknown or empty extensions
   * resolve to the fallback category.
   */
  classify(extension: string): string {
    return this.index.get(extension.toLowerCase()) ?? FALLBACK_CATEGORY;
  }

  classifyFile(fileName: string): string {
    return this.classify(extensionOf(fileName));
  }
}
