import { SSE_HEARTBEAT_INTERVAL_MS } from './constants.js';

/** The part of a writable response the SSE manager relies on. Express responses satisfy it. */
export interface SseClient {
  readonly writableEnded: boolean;
  write(chunk: string): boolean;
  end(): unknown;
  on(event: 'close' | 'error', listener: () => void): unknown;
}

/** Event sent to every stream right before the dashboard shuts down. */
export const SHUTDOWN_EVENT = 'shutdown';

/**
 * Encode one named event in the text/event-stream format.
 *
 * @param event - Event name.
 * @param data - Payload, serialized as a single JSON line.
 * @returns The framed message, terminated by a blank line.
 */
export function formatSseEvent(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

/**
 * Fan-out for the dashboard's event streams. Each client gets a keepalive
 * comment on a timer until it disconnects or the manager is closed.
 *
 * Once closed, the manager ends any stream handed to it, so a browser that
 * reconnects during shutdown cannot keep the HTTP server open.
 */
export class SseManager {
  private readonly streams: Map<SseClient, ReturnType<typeof setInterval>> = new Map();
  private closed = false;

  /** Whether closeAll has run. */
  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Start streaming to a client.
   *
   * @param res - Response that already carries the event-stream headers.
   * @returns false when the manager is closed and the stream was ended instead.
   */
  addClient(res: SseClient): boolean {
    if (this.closed) {
      if (!res.writableEnded) res.end();
      return false;
    }

    const heartbeat = setInterval(() => {
      if (!res.writableEnded) res.write(':keepalive\n\n');
    }, SSE_HEARTBEAT_INTERVAL_MS);
    this.streams.set(res, heartbeat);

    const drop = (): void => {
      this.removeClient(res);
    };
    res.on('close', drop);
    res.on('error', drop);
    return true;
  }

  /** Stop tracking a client and its keepalive timer. The stream itself is left open. */
  removeClient(res: SseClient): void {
    const heartbeat = this.streams.get(res);
    if (heartbeat === undefined) return;
    clearInterval(heartbeat);
    this.streams.delete(res);
  }

  /**
   * Send a named event to every client whose stream is still writable.
   *
   * @returns Number of clients written to.
   */
  broadcast(event: string, data: unknown): number {
    const message = formatSseEvent(event, data);
    let sent = 0;
    for (const client of this.streams.keys()) {
      if (client.writableEnded) continue;
      client.write(message);
      sent++;
    }
    return sent;
  }

  /**
   * Tell every client the dashboard is going away, then end each stream and
   * stop its keepalive. An open event stream never goes idle, so the HTTP
   * server cannot finish closing until this has run. Safe to call twice.
   *
   * @returns Number of streams that were ended.
   */
  closeAll(): number {
    if (!this.closed) {
      this.broadcast(SHUTDOWN_EVENT, { type: SHUTDOWN_EVENT, timestamp: Date.now() });
      this.closed = true;
    }

    let ended = 0;
    for (const client of [...this.streams.keys()]) {
      this.removeClient(client);
      if (!client.writableEnded) {
        client.end();
        ended++;
      }
    }
    return ended;
  }

  getClientCount(): number {
    return this.streams.size;
  }
}
