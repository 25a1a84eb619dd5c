/**
 * Engine lifecycle events
 *
 * The engine announces lifecycle events to an optional sink. Delivery is
 * fire-and-forget: the sink's return value is handed back to the caller of
 * `dispatch` but never inspected by the engine.
 */

export type EventPayload = Record<string, unknown>;

/**
 * Receiver for engine events (e.g. an application event bus)
 */
export interface EventSink {
  fire(eventName: string, payload: EventPayload): unknown;
}

export const AUTHORITY_EVENTS = {
  /** Emitted once from the constructor with `{ user }` */
  INITIALIZED: 'authority.initialized',
} as const;

export type AuthorityEventName = (typeof AUTHORITY_EVENTS)[keyof typeof AUTHORITY_EVENTS];

/**
 * Adapt a plain callback into an EventSink
 *
 * @example
 * ```typescript
 * const authority = new Authority(user, createEventSink((name, payload) => bus.emit(name, payload)));
 * ```
 */
export function createEventSink(
  handler: (eventName: string, payload: EventPayload) => unknown
): EventSink {
  return {
    fire: (eventName, payload) => handler(eventName, payload),
  };
}
