import type { Logger } from '../logging/logger.js';
import type { StoreEvent } from '../types/events.js';

export type ChangeHandler = (event: StoreEvent) => void;

/** Opaque handle returned by subscribe; identity is what matters */
export class SubscriptionToken {
  private static nextId = 1;
  readonly id: number;

  constructor() {
    this.id = SubscriptionToken.nextId++;
  }
}

/**
 * Observer list owned by a single store. Handlers run synchronously in
 * registration order; one that throws is logged and skipped.
 */
export class ChangeNotifier {
  private handlers = new Map<SubscriptionToken, ChangeHandler>();
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  get size(): number {
    return this.handlers.size;
  }

  subscribe(handler: ChangeHandler): SubscriptionToken {
    const token = new SubscriptionToken();
    this.handlers.set(token, handler);
    return token;
  }

  unsubscribe(token: SubscriptionToken): void {
    this.handlers.delete(token);
  }

  notify(event: StoreEvent): void {
    // Handlers added during dispatch wait for the next event; removed ones are skipped
    for (const [token, handler] of [...this.handlers]) {
      if (!this.handlers.has(token)) continue;
      try {
        handler(event);
      } catch (err: unknown) {
        this.logger.error({ err, event: event.kind, subscription: token.id }, 'change handler failed');
      }
    }
  }

  clear(): void {
    this.handlers.clear();
  }
}
