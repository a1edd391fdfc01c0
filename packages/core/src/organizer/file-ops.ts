import * as fs from 'fs';
import * as path from 'path';
import { COLLISION_COUNTER_START, COLLISION_SEPARATOR } from '../constants';
import { splitExtension } from '../classifier/extension-classifier';
import { isErrnoException } from '../errors';

/**
 * Moves one file. Implementations throw on failure; the organizer wraps the
 * error into a MoveError for that file.
 */
export type FileMover = (source: string, destination: string) => void;

/** The filesystem calls a move makes. */
export type MoveOps = Pick<
  typeof fs,
  'lstatSync' | 'renameSync' | 'copyFileSync' | 'unlinkSync' | 'readlinkSync' | 'symlinkSync'
>;

/**
 * True when something other than `source` itself sits at `target`.
 * Dangling symlinks count as occupied.
 */
export function isOccupied(target: string, source?: string, ops: Pick<MoveOps, 'lstatSync'> = fs): boolean {
  const existing = ops.lstatSync(target, { throwIfNoEntry: false });
  if (!existing) return false;
  if (source) {
    const original = ops.lstatSync(source, { throwIfNoEntry: false });
    if (original && original.dev === existing.dev && original.ino === existing.ino) {
      return false;
    }
  }
  return true;
}

/**
 * First free path for `fileName` inside `folder`: name.ext, then name_1.ext,
 * name_2.ext, ... The counter has no upper bound.
 *
 * Paths in `claimed` count as taken even when nothing is on disk yet, so a
 * dry run hands out the same names a real run would.
 */
export function resolveDestination(
  folder: string,
  fileName: string,
  source?: string,
  claimed: ReadonlySet<string> = new Set()
): string {
  const taken = (candidate: string) => claimed.has(candidate) || isOccupied(candidate, source);

  const direct = path.join(folder, fileName);
  if (!taken(direct)) return direct;

  const { stem, ext } = splitExtension(fileName);
  for (let counter = COLLISION_COUNTER_START; ; counter++) {
    const candidate = path.join(folder, `${stem}${COLLISION_SEPARATOR}${counter}${ext}`);
    if (!taken(candidate)) return candidate;
  }
}

/**
 * Copies then unlinks, for moves across devices. Links are recreated rather
 * than followed. When the source cannot be removed the copy is removed again,
 * so the file never ends up in both places.
 */
function copyAcrossDevices(source: string, destination: string, ops: MoveOps): void {
  if (ops.lstatSync(source).isSymbolicLink()) {
    ops.symlinkSync(ops.readlinkSync(source), destination);
  } else {
    ops.copyFileSync(source, destination, fs.constants.COPYFILE_EXCL);
  }

  try {
    ops.unlinkSync(source);
  } catch (error) {
    ops.unlinkSync(destination);
    throw error;
  }
}

/**
 * Builds a mover that renames `source` to `destination`, never overwriting.
 *
 * Across devices (EXDEV) it falls back to copy and unlink. A destination that
 * appeared after it was resolved is an error.
 */
export function createFileMover(ops: MoveOps = fs): FileMover {
  return (source, destination) => {
    if (isOccupied(destination, source, ops)) {
      throw new Error(`destination already exists: ${destination}`);
    }
    try {
      ops.renameSync(source, destination);
      return;
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'EXDEV') throw error;
    }
    copyAcrossDevices(source, destination, ops);
  };
}

export const moveFile: FileMover = createFileMover();
