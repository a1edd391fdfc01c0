import type { MoveError } from '../errors';

/**
 * Everything the organizer reports. Sinks decide how (or whether) to show it.
 */
export type OrganizerEvent =
  | { type: 'folder-created'; category: string; path: string; simulated: boolean }
  | {
      type: 'file-moved';
      fileName: string;
      category: string;
      destination: string;
      renamed: boolean; // destination name differs from the source name
      simulated: boolean;
    }
  | { type: 'file-skipped'; fileName: string; category: string; reason: 'already-sorted' }
  | { type: 'file-failed'; fileName: string; category: string; error: MoveError }
  | { type: 'root-missing'; root: string }
  | { type: 'run-summary'; root: string; moved: number; skipped: number; planned: number; simulated: boolean };

export type OrganizerEventType = OrganizerEvent['type'];

export type OrganizerEventOf<T extends OrganizerEventType> = Extract<OrganizerEvent, { type: T }>;

export interface EventSink {
  emit(event: OrganizerEvent): void;
}
