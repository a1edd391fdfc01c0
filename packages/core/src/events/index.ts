export type { EventSink, OrganizerEvent, OrganizerEventOf, OrganizerEventType } from './types';
export { ConsoleEventSink, MemoryEventSink, NullEventSink } from './sinks';
export type { ConsoleEventSinkOptions, ConsoleLike } from './sinks';
