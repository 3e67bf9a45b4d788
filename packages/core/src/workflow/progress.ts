/**
 * Progress events: a one-way, ordered log for an external observer.
 */

export type ProgressPayload = Record<string, unknown>;

export interface ProgressEvent {
  event: string;
  /** ISO-8601 */
  timestamp: string;
  payload: ProgressPayload;
}

export type ProgressSink = (event: ProgressEvent) => void;

export type ProgressEmitter = (event: string, payload?: ProgressPayload) => void;

/**
 * Stamp and forward events to `sink` in emission order. Without a sink, emitting does nothing.
 * Errors thrown by the sink propagate to the emitter's caller.
 */
export function createProgressEmitter(sink?: ProgressSink, now: () => Date = () => new Date()): ProgressEmitter {
  if (!sink) {
    return () => undefined;
  }
  return (event, payload = {}) => {
    sink({ event, timestamp: now().toISOString(), payload });
  };
}

/**
 * Sink that keeps every event, for callers that want the full history.
 */
export function collectProgress(): { events: ProgressEvent[]; sink: ProgressSink } {
  const events: ProgressEvent[] = [];
  return { events, sink: (event) => events.push(event) };
}
