/**
 * Event handler function signature
 */
export type EventHandler<T = unknown> = (eventType: string, payload: T) => Promise<void> | void;

/**
 * Subscription handle returned by on/onAll
 */
export interface EventSubscription {
  id: string;
  unsubscribe: () => void;
}

/**
 * In-process domain event dispatcher
 */
export interface EventDispatcher {
  on(eventType: string, handler: EventHandler): EventSubscription;

  onAll(handler: EventHandler): EventSubscription;

  off(eventType: string, handler: EventHandler): void;

  /**
   * Run every handler for the event; a failing handler never fails the dispatch
   */
  dispatch(eventType: string, payload: unknown): Promise<void>;
}
