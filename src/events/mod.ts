export { ProgressEmitter, type ListenerErrorHandler, type ProgressEventOf, type ProgressEventType } from './emitter';
export { ConsoleProgressListener, type ConsoleOutput } from './listeners/console';
export type { BookFailureReason, EventListener, ProgressEvent } from './types';
