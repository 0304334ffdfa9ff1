// ═══════════════════════════════════════════════════════════════════════════════
// SIGNAL — Typed Fire-and-Forget Notifications
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../observability/logging/index.js';
import { settle } from '../../types/result.js';

export type Listener<Args extends unknown[]> = (...args: Args) => unknown;

export interface Connection {
  readonly connected: boolean;
  disconnect(): void;
}

/**
 * Multi-listener notification. Listeners run in connection order; a throwing
 * or rejecting listener is logged and does not affect the others.
 */
export class Signal<Args extends unknown[]> {
  private readonly logger = getLogger({ component: 'signal' });
  private readonly listeners = new Set<Listener<Args>>();

  constructor(readonly name: string) {}

  connect(listener: Listener<Args>): Connection {
    // Wrap so the same function can be connected twice.
    const entry: Listener<Args> = (...args) => listener(...args);
    this.listeners.add(entry);

    const listeners = this.listeners;
    return {
      get connected() {
        return listeners.has(entry);
      },
      disconnect() {
        listeners.delete(entry);
      },
    };
  }

  fire(...args: Args): void {
    for (const listener of [...this.listeners]) {
      void settle(() => listener(...args)).then((result) => {
        if (!result.ok) {
          this.logger.error(`Listener for ${this.name} failed`, result.error, { signal: this.name });
        }
      });
    }
  }

  disconnectAll(): void {
    this.listeners.clear();
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}
