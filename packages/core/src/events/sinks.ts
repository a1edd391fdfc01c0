import * as path from 'path';
import pc from 'picocolors';
import type { EventSink, OrganizerEvent, OrganizerEventOf, OrganizerEventType } from './types';

export type ConsoleLike = Pick<Console, 'log' | 'warn' | 'error'>;

export interface ConsoleEventSinkOptions {
  /** Suppress per-file and per-folder lines. Errors and the summary still print. */
  quiet?: boolean;
  colors?: boolean;
  console?: ConsoleLike;
  prefix?: string;
}

/**
 * Prints events as log lines: `[Organizer] Moved: report.pdf -> Documents/`
 */
export class ConsoleEventSink implements EventSink {
  private readonly quiet: boolean;
  private readonly out: ConsoleLike;
  private readonly prefix: string;
  private readonly colors: ReturnType<typeof pc.createColors>;

  constructor(options: ConsoleEventSinkOptions = {}) {
    this.quiet = options.quiet ?? false;
    this.out = options.console ?? console;
    this.prefix = options.prefix ?? '[Organizer]';
    this.colors = pc.createColors(options.colors ?? pc.isColorSupported);
  }

  emit(event: OrganizerEvent): void {
    const c = this.colors;
    switch (event.type) {
      case 'folder-created':
        if (this.quiet) return;
        this.out.log(`${this.prefix} ${event.simulated ? 'Would create folder' : 'Created folder'}: ${event.category}`);
        return;
      case 'file-moved': {
        if (this.quiet) return;
        const verb = event.simulated ? 'Would move' : 'Moved';
        const rename = event.renamed ? ` (as ${path.basename(event.destination)})` : '';
        this.out.log(`${this.prefix} ${verb}: ${event.fileName} -> ${c.cyan(`${event.category}/`)}${rename}`);
        return;
      }
      case 'file-skipped':
        if (this.quiet) return;
        this.out.log(c.dim(`${this.prefix} Already in place: ${event.fileName}`));
        return;
      case 'file-failed':
        this.out.error(c.red(`${this.prefix} ${event.error.message}`));
        return;
      case 'root-missing':
        this.out.error(c.red(`${this.prefix} Folder not found: ${event.root}`));
        return;
      case 'run-summary':
        if (event.simulated) {
          this.out.log(c.green(`${this.prefix} Dry run complete. Would move: ${event.planned}`));
        } else {
          this.out.log(
            c.green(`${this.prefix} Organization complete. Moved: ${event.moved}, Skipped: ${event.skipped}`)
          );
        }
        return;
    }
  }
}

/**
 * Collects events in memory.
 */
export class MemoryEventSink implements EventSink {
  readonly events: OrganizerEvent[] = [];

  emit(event: OrganizerEvent): void {
    this.events.push(event);
  }

  ofType<T extends OrganizerEventType>(type: T): OrganizerEventOf<T>[] {
    return this.events.filter((event): event is OrganizerEventOf<T> => event.type === type);
  }

  clear(): void {
    this.events.length = 0;
  }
}

export class NullEventSink implements EventSink {
  emit(): void {
    // discard
  }
}
