import { Logger } from '@nestjs/common';
import {
  EventDispatcher,
  EventHandler,
  EventSubscription,
} from '../interfaces';

/**
 * Default in-process EventDispatcher
 *
 * Supports several handlers per event type plus catch-all handlers.
 * A failing handler is logged and never fails the dispatch.
 */
export class EventDispatcherImpl implements EventDispatcher {
  private readonly logger = new Logger(EventDispatcherImpl.name);
  private handlers: Map<string, Set<EventHandler>> = new Map();
  private globalHandlers: Set<EventHandler> = new Set();
  private subscriptionIdCounter = 0;

  on(eventType: string, handler: EventHandler): EventSubscription {
    const subscriptionId = `sub_${++this.subscriptionIdCounter}`;

    let handlers = this.handlers.get(eventType);
    if (!handlers) {
      handlers = new Set();
      this.handlers.set(eventType, handlers);
    }
    handlers.add(handler);

    return {
      id: subscriptionId,
      unsubscribe: () => this.off(eventType, handler),
    };
  }

  onAll(handler: EventHandler): EventSubscription {
    const subscriptionId = `sub_${++this.subscriptionIdCounter}`;
    this.globalHandlers.add(handler);

    return {
      id: subscriptionId,
      unsubscribe: () => {
        this.globalHandlers.delete(handler);
      },
    };
  }

  off(eventType: string, handler: EventHandler): void {
    const handlers = this.handlers.get(eventType);
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        this.handlers.delete(eventType);
      }
    }
  }

  /**
   * Remove every handler for one event type, or all of them
   */
  removeAllHandlers(eventType?: string): void {
    if (eventType) {
      this.handlers.delete(eventType);
    } else {
      this.handlers.clear();
      this.globalHandlers.clear();
    }
  }

  async dispatch(eventType: string, payload: unknown): Promise<void> {
    const allHandlers = [...(this.handlers.get(eventType) ?? []), ...this.globalHandlers];

    const results = await Promise.allSettled(
      allHandlers.map(async (handler) => handler(eventType, payload)),
    );

    for (const [index, result] of results.entries()) {
      if (result.status === 'rejected') {
        const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
        this.logger.error(
          `Handler ${allHandlers[index].name || 'anonymous'} failed for ${eventType}: ${reason}`,
        );
      }
    }
  }

  getHandlerCount(eventType?: string): number {
    if (eventType) {
      return (this.handlers.get(eventType)?.size ?? 0) + this.globalHandlers.size;
    }

    let total = this.globalHandlers.size;
    for (const handlers of this.handlers.values()) {
      total += handlers.size;
    }
    return total;
  }

  getEventTypes(): string[] {
    return Array.from(this.handlers.keys());
  }
}
