/**
 * Deadline Connection
 *
 * Duplex wrapper around an accepted socket. The read deadline only runs
 * while the consumer is waiting for bytes and nothing is being written:
 * every chunk received re-arms it, and backpressure, a pause or a pending
 * write suspend it. Every write must flush before the write deadline.
 * When either expires the connection is destroyed. A timeout of 0 turns
 * that deadline off.
 *
 * The HTTP server accepts any Duplex through its `connection` event, so
 * the wrapper is what the server reads from and writes to.
 */

import type { Socket } from 'net';
import { Duplex } from 'stream';

export interface Deadlines {
  readTimeoutMs: number;
  writeTimeoutMs: number;
}

export class DeadlineExceededError extends Error {
  readonly code = 'ETIMEDOUT';

  constructor(
    readonly direction: 'read' | 'write',
    readonly timeoutMs: number
  ) {
    super(`${direction} deadline of ${timeoutMs}ms exceeded`);
    this.name = 'DeadlineExceededError';
  }
}

export class DeadlineConnection extends Duplex {
  private readTimer: NodeJS.Timeout | null = null;
  private writeTimer: NodeJS.Timeout | null = null;
  // Consumer wants data; cleared by backpressure, pause and end of input
  private reading = true;
  private pendingWrites = 0;

  constructor(
    readonly socket: Socket,
    private readonly deadlines: Deadlines
  ) {
    super();

    socket.on('data', (chunk: Buffer) => {
      if (this.push(chunk)) {
        this.armReadDeadline();
      } else {
        this.reading = false;
        this.clearReadDeadline();
        socket.pause();
      }
    });
    socket.on('end', () => {
      this.reading = false;
      this.clearReadDeadline();
      this.push(null);
    });
    socket.on('error', (error) => {
      this.destroy(error);
    });
    socket.on('close', () => {
      if (!this.destroyed) {
        this.destroy();
      }
    });
    socket.on('timeout', () => {
      this.emit('timeout');
    });

    this.armReadDeadline();
  }

  get remoteAddress(): string | undefined {
    return this.socket.remoteAddress;
  }

  get remotePort(): number | undefined {
    return this.socket.remotePort;
  }

  get remoteFamily(): string | undefined {
    return this.socket.remoteFamily;
  }

  get localAddress(): string | undefined {
    return this.socket.localAddress;
  }

  get localPort(): number | undefined {
    return this.socket.localPort;
  }

  /**
   * Idle timeout, used by the HTTP server for keep-alive
   */
  setTimeout(timeoutMs: number, callback?: () => void): this {
    this.socket.setTimeout(timeoutMs, callback);
    return this;
  }

  setNoDelay(noDelay?: boolean): this {
    this.socket.setNoDelay(noDelay);
    return this;
  }

  setKeepAlive(enable?: boolean, initialDelay?: number): this {
    this.socket.setKeepAlive(enable, initialDelay);
    return this;
  }

  override pause(): this {
    this.reading = false;
    this.clearReadDeadline();
    return super.pause();
  }

  override resume(): this {
    this.reading = !this.readableEnded;
    this.armReadDeadline();
    return super.resume();
  }

  override _read(): void {
    this.reading = true;
    this.armReadDeadline();
    this.socket.resume();
  }

  override _write(
    chunk: Buffer | string,
    encoding: BufferEncoding,
    callback: (error?: Error | null) => void
  ): void {
    this.pendingWrites += 1;
    this.clearReadDeadline();
    this.armWriteDeadline();
    this.socket.write(chunk, encoding, (error) => {
      this.pendingWrites -= 1;
      this.clearWriteDeadline();
      this.armReadDeadline();
      callback(error);
    });
  }

  override _final(callback: (error?: Error | null) => void): void {
    this.socket.end(() => {
      callback();
    });
  }

  override _destroy(
    error: Error | null,
    callback: (error?: Error | null) => void
  ): void {
    this.clearReadDeadline();
    this.clearWriteDeadline();
    if (!this.socket.destroyed) {
      this.socket.destroy(error ?? undefined);
    }
    callback(error);
  }

  private armReadDeadline(): void {
    this.clearReadDeadline();
    const { readTimeoutMs } = this.deadlines;
    if (
      readTimeoutMs > 0 &&
      this.reading &&
      this.pendingWrites === 0 &&
      !this.destroyed
    ) {
      this.readTimer = setTimeout(() => {
        this.destroy(new DeadlineExceededError('read', readTimeoutMs));
      }, readTimeoutMs);
    }
  }

  private clearReadDeadline(): void {
    if (this.readTimer !== null) {
      clearTimeout(this.readTimer);
      this.readTimer = null;
    }
  }

  private armWriteDeadline(): void {
    this.clearWriteDeadline();
    const { writeTimeoutMs } = this.deadlines;
    if (writeTimeoutMs > 0) {
      this.writeTimer = setTimeout(() => {
        this.destroy(new DeadlineExceededError('write', writeTimeoutMs));
      }, writeTimeoutMs);
    }
  }

  private clearWriteDeadline(): void {
    if (this.writeTimer !== null) {
      clearTimeout(this.writeTimer);
      this.writeTimer = null;
    }
  }
}
