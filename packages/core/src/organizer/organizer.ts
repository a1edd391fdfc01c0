import * as fs from 'fs';
import * as path from 'path';
import { HIDDEN_FILE_PREFIX } from '../constants';
import { ExtensionClassifier, extensionOf } from '../classifier/extension-classifier';
import {
  FolderCreationError,
  IOError,
  MoveError,
  RootNotFoundError,
  describeError,
  isErrnoException,
  type MoveResult,
} from '../errors';
import type { CategoryFiles, CategoryListing, MoveDecision, OrganizeOptions, OrganizeSummary } from '../contracts';
import type { EventSink } from '../events/types';
import { ConsoleEventSink } from '../events/sinks';
import { moveFile, resolveDestination, type FileMover } from './file-ops';

/**
 * A direct child of the root, recomputed on every scan.
 */
export interface FileEntry {
  name: string;
  path: string;
  extension: string;
  parentName: string;
}

export interface OrganizerOptions {
  classifier?: ExtensionClassifier;
  sink?: EventSink;
  mover?: FileMover;
}

/**
 * Directory-like entries are left alone. A symlink counts as a directory
 * when its target is one.
 */
function isFileEntry(entry: fs.Dirent, fullPath: string): boolean {
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;
  let target: fs.Stats | undefined;
  try {
    target = fs.statSync(fullPath, { throwIfNoEntry: false });
  } catch {
    // Link loops and unreadable targets are moved as links.
    return true;
  }
  // Dangling links are moved like files.
  return !target || !target.isDirectory();
}

/** Code-unit order, independent of the locale. */
function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Sorts the regular files directly inside one directory into category
 * folders named after the classifier's categories.
 *
 * Synchronous: every filesystem call completes before the next file
 * is looked at, and a failed move is reported and skipped, never retried.
 */
export class Organizer {
  readonly root: string;
  readonly classifier: ExtensionClassifier;
  private readonly sink: EventSink;
  private readonly mover: FileMover;

  constructor(root: string, options: OrganizerOptions = {}) {
    this.root = path.resolve(root);
    this.classifier = options.classifier ?? new ExtensionClassifier();
    this.sink = options.sink ?? new ConsoleEventSink();
    this.mover = options.mover ?? moveFile;
  }

  /**
   * Creates every missing category folder under the root and returns the
   * categories it created. Existing folders are left as they are.
   *
   * With `simulate` nothing is created; missing folders are reported as
   * simulated `folder-created` events instead.
   *
   * @throws FolderCreationError when a non-directory occupies a category
   * path or mkdir fails. Callers abort the run.
   */
  ensureCategoryFolders(options: OrganizeOptions = {}): string[] {
    const simulate = options.simulate ?? false;
    const created: string[] = [];

    for (const category of this.classifier.categories) {
      const folderPath = path.join(this.root, category);
      let existing: fs.Stats | undefined;
      try {
        existing = fs.statSync(folderPath, { throwIfNoEntry: false });
      } catch (error) {
        throw new FolderCreationError(folderPath, error);
      }
      if (existing) {
        if (!existing.isDirectory()) {
          throw new FolderCreationError(folderPath, new Error('a non-directory entry already exists there'));
        }
        continue;
      }

      if (!simulate) {
        try {
          fs.mkdirSync(folderPath);
        } catch (error) {
          throw new FolderCreationError(folderPath, error);
        }
      }

      created.push(category);
      this.sink.emit({ type: 'folder-created', category, path: folderPath, simulated: simulate });
    }

    return created;
  }

  /**
   * Moves every visible regular file in the root into its category folder.
   *
   * Hidden names and directories are excluded from all counts. Files whose
   * parent folder already carries their category name are left in place.
   * In simulate mode the returned decisions say what a real run would do and
   * the `moved`/`skipped` counters stay at zero.
   *
   * @throws RootNotFoundError before touching anything when the root is missing
   * @throws FolderCreationError when a category folder cannot be created
   */
  organize(options: OrganizeOptions = {}): OrganizeSummary {
    const simulate = options.simulate ?? false;

    this.assertRoot();
    this.ensureCategoryFolders({ simulate });

    const decisions: MoveDecision[] = [];
    let moved = 0;
    let skipped = 0;
    let planned = 0;
    // Destinations handed out during this run, moved or not.
    const claimed = new Set<string>();

    for (const entry of this.scan()) {
      const category = this.classifier.classify(entry.extension);

      if (entry.parentName === category) {
        decisions.push({
          source: entry.path,
          fileName: entry.name,
          category,
          destination: entry.path,
          action: 'skipped-same-location',
        });
        this.sink.emit({ type: 'file-skipped', fileName: entry.name, category, reason: 'already-sorted' });
        continue;
      }

      const result = this.place(entry, path.join(this.root, category), claimed, simulate);
      if (!result.ok) {
        if (!simulate) skipped++;
        decisions.push({
          source: entry.path,
          fileName: entry.name,
          category,
          destination: result.error.destination,
          action: 'skipped-error',
          error: describeError(result.error.cause),
        });
        this.sink.emit({ type: 'file-failed', fileName: entry.name, category, error: result.error });
        continue;
      }

      const { destination } = result;
      const renamed = path.basename(destination) !== entry.name;
      if (simulate) {
        planned++;
      } else {
        moved++;
      }
      decisions.push({
        source: entry.path,
        fileName: entry.name,
        category,
        destination,
        action: simulate ? 'would-move' : 'moved',
      });
      this.sink.emit({ type: 'file-moved', fileName: entry.name, category, destination, renamed, simulated: simulate });
    }

    this.sink.emit({ type: 'run-summary', root: this.root, moved, skipped, planned, simulated: simulate });

    return { root: this.root, simulated: simulate, moved, skipped, planned, decisions };
  }

  /**
   * Regular files currently inside each existing category folder, in table
   * order, with the grand total. Read-only.
   */
  listByCategory(): CategoryListing {
    this.assertRoot();

    const categories: CategoryFiles[] = [];
    let total = 0;

    for (const category of this.classifier.categories) {
      const folderPath = path.join(this.root, category);
      let stats: fs.Stats | undefined;
      try {
        stats = fs.statSync(folderPath, { throwIfNoEntry: false });
      } catch (error) {
        throw new IOError(`Cannot access ${folderPath}: ${describeError(error)}`, { cause: error });
      }
      if (!stats || !stats.isDirectory()) continue;

      const files = this.readEntries(folderPath)
        .filter((entry) => isFileEntry(entry, path.join(folderPath, entry.name)))
        .map((entry) => entry.name)
        .sort(compareNames);

      categories.push({ category, files });
      total += files.length;
    }

    return { root: this.root, categories, total };
  }

  /**
   * Visible files directly under the root, sorted by name.
   */
  scan(): FileEntry[] {
    const parentName = path.basename(this.root);
    return this.readEntries(this.root)
      .filter((entry) => !entry.name.startsWith(HIDDEN_FILE_PREFIX))
      .filter((entry) => isFileEntry(entry, path.join(this.root, entry.name)))
      .map((entry) => ({
        name: entry.name,
        path: path.join(this.root, entry.name),
        extension: extensionOf(entry.name),
        parentName,
      }))
      .sort((a, b) => compareNames(a.name, b.name));
  }

  private assertRoot(): void {
    let stats: fs.Stats | undefined;
    try {
      stats = fs.statSync(this.root, { throwIfNoEntry: false });
    } catch (error) {
      // A file somewhere along the path: the root cannot exist.
      if (!isErrnoException(error) || error.code !== 'ENOTDIR') {
        throw new IOError(`Cannot access ${this.root}: ${describeError(error)}`, { cause: error });
      }
    }
    if (!stats || !stats.isDirectory()) {
      this.sink.emit({ type: 'root-missing', root: this.root });
      throw new RootNotFoundError(this.root);
    }
  }

  private readEntries(dirPath: string): fs.Dirent[] {
    try {
      return fs.readdirSync(dirPath, { withFileTypes: true });
    } catch (error) {
      throw new IOError(`Cannot read directory ${dirPath}: ${describeError(error)}`, { cause: error });
    }
  }

  /**
   * Resolves a free destination for one file, claims it, and moves the file
   * unless simulating. Any failure, resolution included, stays with this file.
   */
  private place(entry: FileEntry, folder: string, claimed: Set<string>, simulate: boolean): MoveResult {
    let destination = path.join(folder, entry.name);
    try {
      destination = resolveDestination(folder, entry.name, entry.path, claimed);
      claimed.add(destination);
      if (!simulate) this.mover(entry.path, destination);
      return { ok: true, destination };
    } catch (error) {
      return { ok: false, error: new MoveError(entry.name, destination, error) };
    }
  }
}
