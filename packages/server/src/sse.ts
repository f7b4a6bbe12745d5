/**
 * Server-Sent Events plumbing shared by the stream routes.
 */

import type { ServerResponse } from 'node:http';
import type { BusHandler, BusMessage } from 'mendgraph-core';

/** Encode one bus message as an SSE frame whose data repeats the event name. */
export function formatSseEvent(msg: BusMessage): string {
  return `event: ${msg.event}\ndata: ${JSON.stringify({ event: msg.event, ...msg.data })}\n\n`;
}

/**
 * Open streams, so the server can end them on shutdown instead of waiting
 * for every client to disconnect.
 */
export class SseStreams {
  private readonly closers = new Set<() => void>();

  constructor(private readonly keepAliveMs: number) {}

  get size(): number {
    return this.closers.size;
  }

  /**
   * Take over the response and relay everything `subscribe` delivers.
   * `subscribe` returns its unsubscribe function.
   */
  open(
    reply: { raw: ServerResponse; hijack(): unknown },
    subscribe: (handler: BusHandler) => () => void,
  ): void {
    reply.hijack();
    reply.raw.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });

    const write = (chunk: string): void => {
      if (!reply.raw.writableEnded) reply.raw.write(chunk);
    };

    const unsubscribe = subscribe((msg) => write(formatSseEvent(msg)));
    const keepAlive = setInterval(() => write(': keep-alive\n\n'), this.keepAliveMs);

    const close = (): void => {
      if (!this.closers.delete(close)) return;
      clearInterval(keepAlive);
      unsubscribe();
      reply.raw.end();
    };
    this.closers.add(close);
    reply.raw.on('close', close);
  }

  closeAll(): void {
    for (const close of [...this.closers]) close();
  }
}
