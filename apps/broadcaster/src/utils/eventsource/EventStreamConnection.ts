/**
 * Byte-level ownership of one consumer's socket
 * Writes the raw response head, then frames either straight to the socket or
 * through a gzip stream flushed after every frame. Every write is bounded by a
 * deadline, and the socket is closed exactly once.
 */

import type { Duplex, Writable } from 'node:stream';
import { createGzip, constants as zlibConstants, type Gzip } from 'node:zlib';
import type { Logger } from 'pino';
import { ConnectionClosedError, WriteTimeoutError } from '../../types/errors.ts';

type WriteCallback = (error?: Error | null) => void;

export interface EventStreamConnectionOptions {
  compress: boolean;
  /** Bound on each write and on a graceful close */
  writeTimeoutMs: number;
  logger: Logger;
}

export class EventStreamConnection {
  readonly socket: Duplex;
  readonly compressed: boolean;
  private readonly gzip: Gzip | null;
  private readonly writeTimeoutMs: number;
  private readonly logger: Logger;
  private closed = false;
  /** Writes whose callback has not fired yet, timed out or not */
  private inFlight = 0;

  constructor(socket: Duplex, options: EventStreamConnectionOptions) {
    this.socket = socket;
    this.compressed = options.compress;
    this.writeTimeoutMs = options.writeTimeoutMs;
    this.logger = options.logger;

    if (options.compress) {
      // Gzip emits nothing until the first frame, so the raw head goes first
      this.gzip = createGzip({ level: zlibConstants.Z_DEFAULT_COMPRESSION });
      this.gzip.pipe(socket);
    } else {
      this.gzip = null;
    }
  }

  /** True once this side has closed or the peer has gone away */
  get isClosed(): boolean {
    return this.closed || this.socket.destroyed;
  }

  /**
   * True while an earlier write is still buffered behind a slow peer.
   * Writing now would only grow the buffer.
   */
  get isWritePending(): boolean {
    return this.inFlight > 0 || this.socket.writableNeedDrain;
  }

  /** Stream that errors may surface on besides the socket */
  get encoder(): Writable | null {
    return this.gzip;
  }

  /**
   * Write the uncompressed response head
   */
  writeHead(head: Buffer): Promise<void> {
    return this.withDeadline((callback) => this.rawWrite(head, callback));
  }

  /**
   * Write one encoded frame through the active encoder
   */
  write(frame: Buffer): Promise<void> {
    return this.withDeadline((callback) => {
      if (this.gzip) {
        this.gzipWrite(this.gzip, frame, callback);
      } else {
        this.rawWrite(frame, callback);
      }
    });
  }

  /**
   * Flush and end the stream, then release the socket.
   * A peer that never drains is destroyed after the write deadline.
   */
  close(): boolean {
    if (this.closed) return false;
    this.closed = true;

    const socket = this.socket;
    if (socket.destroyed) return true;

    const forceTimer = setTimeout(() => socket.destroy(), this.writeTimeoutMs);
    forceTimer.unref();
    socket.once('close', () => clearTimeout(forceTimer));
    socket.once('finish', () => socket.destroy());

    if (this.gzip) {
      // The pipe ends the socket once the gzip trailer is out
      this.gzip.end();
    } else {
      socket.end();
    }
    return true;
  }

  /**
   * Tear the connection down immediately, discarding buffered output
   */
  destroy(): boolean {
    if (this.closed) return false;
    this.closed = true;

    this.gzip?.destroy();
    this.socket.destroy();
    return true;
  }

  private rawWrite(chunk: Buffer, callback: WriteCallback): void {
    if (this.isClosed) {
      process.nextTick(callback, new ConnectionClosedError());
      return;
    }
    this.socket.write(chunk, callback);
  }

  private gzipWrite(gzip: Gzip, chunk: Buffer, callback: WriteCallback): void {
    if (this.isClosed) {
      process.nextTick(callback, new ConnectionClosedError());
      return;
    }

    gzip.write(chunk);
    gzip.flush(() => {
      if (this.isClosed) {
        callback(new ConnectionClosedError());
      } else if (this.socket.writableNeedDrain) {
        // Compressed bytes are still queued behind a slow peer
        this.socket.once('drain', () => callback());
      } else {
        callback();
      }
    });
  }

  private withDeadline(start: (callback: WriteCallback) => void): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let settled = false;

      const timer = setTimeout(() => {
        settled = true;
        reject(new WriteTimeoutError(this.writeTimeoutMs));
      }, this.writeTimeoutMs);

      this.inFlight++;
      start((error) => {
        this.inFlight--;
        if (settled) {
          if (error) {
            this.logger.debug(
              { err: error },
              'Write failed after its deadline had passed',
            );
          }
          return;
        }
        settled = true;
        clearTimeout(timer);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}
