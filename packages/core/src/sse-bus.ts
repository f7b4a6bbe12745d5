/**
 * @module sse-bus
 * In-process event bus for Server-Sent Events (SSE) broadcasting.
 *
 * Channels are keyed by name (`workflow:<id>`, `runs`). The approval queue and
 * the workflow engine publish here; the HTTP server relays to SSE clients.
 */

import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { errorMessage } from './errors.js';

/** A single event on a channel. */
export interface BusMessage {
  event: string;
  data: Record<string, unknown>;
}

export type BusHandler = (msg: BusMessage) => void;

/**
 * Usage:
 * ```ts
 * const bus = createEventBus();
 * const unsub = bus.subscribe('workflow:wf-1', (msg) => console.log(msg));
 * bus.emit('workflow:wf-1', { event: 'decided', data: { proposalId: 'p-1' } });
 * unsub();
 * ```
 */
export class EventBus {
  private listeners = new Map<string, Set<BusHandler>>();

  constructor(private readonly logger: Logger = silentLogger) {}

  /**
   * Deliver a message synchronously to every subscriber of a channel.
   * A throwing handler is logged and does not stop delivery to the others.
   */
  emit(channel: string, message: BusMessage): void {
    const subs = this.listeners.get(channel);
    if (!subs) return;
    for (const handler of [...subs]) {
      try {
        handler(message);
      } catch (err) {
        this.logger.warn(`Subscriber on ${channel} failed for ${message.event}: ${errorMessage(err)}`);
      }
    }
  }

  /** @returns An unsubscribe function */
  subscribe(channel: string, handler: BusHandler): () => void {
    let subs = this.listeners.get(channel);
    if (!subs) {
      subs = new Set();
      this.listeners.set(channel, subs);
    }
    subs.add(handler);

    return () => {
      subs.delete(handler);
      if (subs.size === 0 && this.listeners.get(channel) === subs) {
        this.listeners.delete(channel);
      }
    };
  }

  subscriberCount(channel: string): number {
    return this.listeners.get(channel)?.size ?? 0;
  }

  clear(): void {
    this.listeners.clear();
  }
}

export function createEventBus(logger?: Logger): EventBus {
  return new EventBus(logger);
}
