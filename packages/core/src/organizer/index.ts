export { Organizer } from './organizer';
export type { FileEntry, OrganizerOptions } from './organizer';
export { createFileMover, isOccupied, moveFile, resolveDestination } from './file-ops';
export type { FileMover, MoveOps } from './file-ops';
