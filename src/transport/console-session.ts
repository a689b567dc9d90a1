/**
 * Console Session
 *
 * One connected socket to the console. A session is created connected and
 * ends disconnected; it is never reopened. The transport builds a fresh
 * session for every successful connect.
 *
 * Two writers share the socket: frame sequences from the dispatcher and the
 * liveness pulse. Both go through one promise-chain lock, held for exactly
 * one sequence (or one liveness byte), so frames never interleave.
 *
 * Emits:
 *   'disconnected' (reason: Error)  once, on write failure, remote close or close()
 */

import { EventEmitter } from 'events';
import { Cancel, Clock, sleep } from '../clock';
import { SendError, toError } from '../errors';
import { LivenessConfig } from '../health/types';
import { buildLiveness, Frame, FrameSequence } from '../midi-protocol';
import { getLogger } from '../logger';
import { SessionStats, recordError } from '../session-stats';
import { ConsoleSocket, ControllerAddress, PacingConfig, SendResult } from './types';

export type SessionState = 'connected' | 'disconnected';

export interface ConsoleSessionOptions {
  id: number;
  address: ControllerAddress;
  socket: ConsoleSocket;
  clock: Clock;
  pacing: PacingConfig;
  liveness: LivenessConfig;
  stats: SessionStats;
}

export class ConsoleSession extends EventEmitter {
  readonly id: number;
  readonly address: ControllerAddress;

  private socket: ConsoleSocket;
  private clock: Clock;
  private pacing: PacingConfig;
  private stats: SessionStats;
  private livenessFrame: Frame;
  private _state: SessionState = 'connected';
  private writeChain: Promise<void> = Promise.resolve();
  private stopLiveness: Cancel | null = null;
  private livenessPending = false;
  private log = getLogger('Session');

  constructor(options: ConsoleSessionOptions) {
    super();
    this.id = options.id;
    this.address = options.address;
    this.socket = options.socket;
    this.clock = options.clock;
    this.pacing = options.pacing;
    this.stats = options.stats;
    this.livenessFrame = buildLiveness(options.liveness.byte);

    this.socket.onClose((err) => {
      this.fail(err ?? new Error('Connection closed by peer'));
    });

    // Fixed period on its own clock; dispatcher traffic never resets it
    if (options.liveness.intervalMs > 0) {
      this.stopLiveness = this.clock.setInterval(() => {
        void this.pulse();
      }, options.liveness.intervalMs);
    }
  }

  get state(): SessionState {
    return this._state;
  }

  isConnected(): boolean {
    return this._state === 'connected';
  }

  /**
   * Write a frame sequence in order, waiting the frame's gap (or the
   * inter-frame delay) after each frame. A write failure ends the session.
   */
  transmit(sequence: FrameSequence): Promise<SendResult> {
    if (!this.isConnected()) {
      return Promise.resolve(this.notConnected());
    }

    return this.exclusive(async (): Promise<SendResult> => {
      let written = 0;
      for (const frame of sequence) {
        // The peer may have gone away while we waited for the lock or between frames
        if (!this.isConnected()) {
          if (written === 0) return this.notConnected();
          return { ok: false, error: new SendError('write_failed', `Session ${this.id} closed mid-sequence`) };
        }
        try {
          await this.socket.write(Buffer.from(frame.bytes));
        } catch (err) {
          const error = toError(err);
          this.fail(error);
          return { ok: false, error: new SendError('write_failed', `Write failed: ${error.message}`) };
        }
        written++;
        this.stats.framesSent++;
        await sleep(this.clock, frame.gapAfterMs ?? this.pacing.interFrameDelayMs);
      }
      this.stats.sequencesSent++;
      return { ok: true };
    });
  }

  /** Close locally. Emits 'disconnected' if the session was still connected. */
  close(reason = 'Closed locally'): void {
    this.end(new Error(reason), false);
  }

  private async pulse(): Promise<void> {
    // Still queued behind a long sequence: that sequence keeps the line busy anyway
    if (this.livenessPending || !this.isConnected()) return;
    this.livenessPending = true;
    try {
      await this.exclusive(async () => {
        if (!this.isConnected()) return;
        try {
          await this.socket.write(Buffer.from(this.livenessFrame.bytes));
          this.stats.livenessSent++;
        } catch (err) {
          const error = toError(err);
          this.log.error({ session: this.id, error: error.message }, 'Liveness write failed');
          this.fail(error);
        }
      });
    } finally {
      this.livenessPending = false;
    }
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeChain.then(task);
    this.writeChain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private fail(reason: Error): void {
    this.end(reason, true);
  }

  private end(reason: Error, isError: boolean): void {
    if (this._state === 'disconnected') return;
    this._state = 'disconnected';

    this.stopLiveness?.();
    this.stopLiveness = null;
    this.socket.close();
    if (isError) recordError(this.stats, reason, this.clock.now());

    this.emit('disconnected', reason);
  }

  private notConnected(): SendResult {
    return { ok: false, error: new SendError('not_connected', `Session ${this.id} is disconnected`) };
  }
}
