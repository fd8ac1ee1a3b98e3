import { Duplex } from 'stream';
import type { RelayMessage } from '../types/remote';

export type RelaySend = (message: RelayMessage) => Promise<void>;

/**
 * One inbound session multiplexed over the relay socket. Bytes written to
 * the stream go to the relay as base64 `session-data` frames; frames from
 * the relay are pushed into the readable side.
 */
export class RelaySession extends Duplex {
  public readonly sessionId: string;
  private send: RelaySend;
  private remoteClosed = false;

  constructor(sessionId: string, send: RelaySend) {
    super();
    this.sessionId = sessionId;
    this.send = send;
  }

  public receive(data: Buffer): void {
    if (!this.remoteClosed) {
      this.push(data);
    }
  }

  public closeFromRemote(): void {
    this.remoteClosed = true;
    this.push(null);
  }

  _read(): void {
    // Data is pushed by receive()
  }

  // The write completes once the relay socket took the frame
  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.send({ type: 'session-data', sessionId: this.sessionId, data: chunk.toString('base64') })
      .then(() => callback(), (err: unknown) => callback(toError(err)));
  }

  _final(callback: (error?: Error | null) => void): void {
    if (this.remoteClosed) {
      callback();
      return;
    }
    this.send({ type: 'session-close', sessionId: this.sessionId })
      .then(() => callback(), (err: unknown) => callback(toError(err)));
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
