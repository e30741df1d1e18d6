import type { EventListener, ProgressEvent } from './types';

export type ProgressEventType = ProgressEvent['type'];

export type ProgressEventOf<T extends ProgressEventType> = Extract<ProgressEvent, { type: T }>;

export type ListenerErrorHandler = (error: unknown, event: ProgressEvent) => void;

const reportToConsole: ListenerErrorHandler = (error, event) => {
  console.error(`Progress listener failed on ${event.type}:`, error);
};

/**
 * Delivers pipeline progress to listeners, either every event through
 * `subscribe` or one event type through `on`. A throwing listener is reported
 * and never stops delivery to the others or the pipeline itself.
 */
export class ProgressEmitter {
  private readonly listeners = new Set<EventListener>();

  constructor(private readonly onListenerError: ListenerErrorHandler = reportToConsole) {}

  subscribe(listener: EventListener): () => void {
    // Wrapped so the same function can be subscribed twice and removed independently
    const entry: EventListener = (event) => listener(event);
    this.listeners.add(entry);
    return () => {
      this.listeners.delete(entry);
    };
  }

  on<T extends ProgressEventType>(type: T, listener: (event: ProgressEventOf<T>) => void): () => void {
    return this.subscribe((event) => {
      if (isEventOfType(event, type)) {
        listener(event);
      }
    });
  }

  emit(event: ProgressEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.onListenerError(error, event);
      }
    }
  }
}

function isEventOfType<T extends ProgressEventType>(event: ProgressEvent, type: T): event is ProgressEventOf<T> {
  return event.type === type;
}
