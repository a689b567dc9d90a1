/**
 * Session Transport
 *
 * Keeps exactly one live session to the console and is the only way the
 * dispatcher reaches the socket. The active session lives in a single cell
 * that connect() fills and a disconnect clears; callers never hold a
 * session across a reconnect.
 *
 * State machine:
 *   disconnected --connect()--> connecting --ok--> connected
 *   connecting --ConnectError--> disconnected
 *   connected --write failure / liveness failure / peer close--> disconnected
 *
 * Nothing is queued while disconnected. A stale button press replayed after
 * an outage could leave the console in a state the operator no longer wants,
 * so send() fails fast with not_connected instead.
 *
 * Emits:
 *   'connected' (sessionId: number)
 *   'disconnected' (reason: Error)
 *   'stateChange' (next: ConnectionState, prev: ConnectionState)
 */

import { EventEmitter } from 'events';
import { Clock, sleep, systemClock } from '../clock';
import { ConnectError, SendError, toError } from '../errors';
import {
  ConnectionState,
  DEFAULT_LIVENESS,
  DEFAULT_RECONNECT,
  LivenessConfig,
  ReconnectConfig,
  calculateBackoff,
} from '../health/types';
import { getLogger } from '../logger';
import { FrameSequence, formatFrames } from '../midi-protocol';
import { SessionStats, createSessionStats, recordError } from '../session-stats';
import { ConsoleSession } from './console-session';
import { netConnector } from './net-connector';
import { ConnectResult, Connector, ControllerAddress, PacingConfig, SendResult } from './types';

export interface SessionTransportOptions {
  address: ControllerAddress;
  connectTimeoutMs?: number;
  pacing?: Partial<PacingConfig>;
  liveness?: Partial<LivenessConfig>;
  reconnect?: Partial<ReconnectConfig>;
  connector?: Connector;
  clock?: Clock;
}

export const DEFAULT_CONNECT_TIMEOUT_MS = 5000;
export const DEFAULT_PACING: PacingConfig = { interFrameDelayMs: 10 };

export class SessionTransport extends EventEmitter {
  readonly address: ControllerAddress;

  private connectTimeoutMs: number;
  private pacing: PacingConfig;
  private liveness: LivenessConfig;
  private reconnectConfig: ReconnectConfig;
  private connector: Connector;
  private clock: Clock;
  private stats: SessionStats;

  private active: ConsoleSession | null = null;
  private _state: ConnectionState = 'disconnected';
  private connectAttempt: Promise<ConnectResult<ConsoleSession>> | null = null;
  private reconnectRun: Promise<boolean> | null = null;
  private supervising = false;
  private stopped = false;
  private abort = new AbortController();
  private nextSessionId = 1;
  private log = getLogger('Transport');

  constructor(options: SessionTransportOptions) {
    super();
    this.address = { host: options.address.host, port: options.address.port };
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.pacing = { ...DEFAULT_PACING, ...options.pacing };
    this.liveness = { ...DEFAULT_LIVENESS, ...options.liveness };
    this.reconnectConfig = { ...DEFAULT_RECONNECT, ...options.reconnect };
    this.connector = options.connector ?? netConnector;
    this.clock = options.clock ?? systemClock;
    this.stats = createSessionStats(this.address.host, this.address.port);
  }

  get state(): ConnectionState {
    return this._state;
  }

  isConnected(): boolean {
    return this.active?.isConnected() ?? false;
  }

  getStats(): SessionStats {
    return { ...this.stats };
  }

  /**
   * Open a new session. Concurrent calls share the attempt in flight.
   * On success the new session becomes the active one and starts its
   * liveness pulse.
   */
  connect(): Promise<ConnectResult<ConsoleSession>> {
    if (this.stopped) {
      return Promise.resolve({ ok: false, error: new ConnectError('unreachable', 'Transport is stopped') });
    }
    if (this.active && this.active.isConnected()) {
      return Promise.resolve({ ok: true, session: this.active });
    }
    if (this.connectAttempt) return this.connectAttempt;

    const attempt = this.openSession().finally(() => {
      this.connectAttempt = null;
    });
    this.connectAttempt = attempt;
    return attempt;
  }

  /**
   * Send one frame sequence on the active session. Fails fast with
   * not_connected while disconnected or connecting; never retries.
   */
  async send(sequence: FrameSequence): Promise<SendResult> {
    const session = this.active;
    if (!session || !session.isConnected()) {
      this.stats.droppedSequences++;
      return {
        ok: false,
        error: new SendError('not_connected', `Not connected to ${this.address.host}:${this.address.port}`),
      };
    }

    this.log.trace({ session: session.id, frames: formatFrames(sequence) }, 'Sending sequence');
    const result = await session.transmit(sequence);
    if (!result.ok) {
      this.stats.droppedSequences++;
    }
    return result;
  }

  /**
   * Retry connect() until connected or stopped, waiting the backoff after
   * each failure. The first attempt is immediate. Only one loop runs at a
   * time; a second call joins the running one.
   *
   * @returns true once connected, false if the transport was stopped first
   */
  reconnectLoop(): Promise<boolean> {
    if (this.reconnectRun) return this.reconnectRun;

    const run = this.runReconnectLoop().finally(() => {
      this.reconnectRun = null;
    });
    this.reconnectRun = run;
    return run;
  }

  /** Connect now and reconnect after every disconnect until stop() */
  supervise(): void {
    if (this.stopped) return;
    this.supervising = true;
    this.startReconnect();
  }

  /** Cancel reconnects and close the active session. Idempotent. */
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.supervising = false;
    this.abort.abort();

    const session = this.active;
    this.active = null;
    if (session) {
      session.close('Transport stopped');
      this.stats.connected = false;
      this.stats.lastDisconnectedAt = this.clock.now();
    }
    this.setState('disconnected');
  }

  // --- Internals ---

  private async openSession(): Promise<ConnectResult<ConsoleSession>> {
    this.setState('connecting');
    this.log.debug({ host: this.address.host, port: this.address.port }, 'Connecting');

    try {
      const socket = await this.connector(this.address, this.connectTimeoutMs);
      if (this.stopped) {
        socket.close();
        this.setState('disconnected');
        return { ok: false, error: new ConnectError('unreachable', 'Transport stopped while connecting') };
      }

      const session = new ConsoleSession({
        id: this.nextSessionId++,
        address: this.address,
        socket,
        clock: this.clock,
        pacing: this.pacing,
        liveness: this.liveness,
        stats: this.stats,
      });
      this.install(session);
      return { ok: true, session };
    } catch (err) {
      const error = err instanceof ConnectError ? err : new ConnectError('unreachable', toError(err).message);
      this.stats.failedConnectAttempts++;
      recordError(this.stats, error, this.clock.now());
      this.setState('disconnected');
      return { ok: false, error };
    }
  }

  /** The single swap point for the active session */
  private install(session: ConsoleSession): void {
    this.active = session;
    this.stats.connectCount++;
    if (this.stats.connectCount > 1) this.stats.reconnectCount++;
    this.stats.connected = true;
    this.stats.lastConnectedAt = this.clock.now();

    session.once('disconnected', (reason: Error) => this.onSessionDisconnected(session, reason));

    this.setState('connected');
    this.log.info(
      { session: session.id, host: this.address.host, port: this.address.port },
      'Connected to console',
    );
    this.emit('connected', session.id);
  }

  private onSessionDisconnected(session: ConsoleSession, reason: Error): void {
    if (this.active !== session) return;
    this.active = null;
    this.stats.connected = false;
    this.stats.lastDisconnectedAt = this.clock.now();
    this.setState('disconnected');

    this.log.warn({ session: session.id, reason: reason.message }, 'Connection lost');
    this.emit('disconnected', reason);

    if (this.supervising && !this.stopped) {
      this.startReconnect();
    }
  }

  private startReconnect(): void {
    this.reconnectLoop().catch((err: unknown) => {
      this.log.error({ error: toError(err).message }, 'Reconnect loop failed');
    });
  }

  private async runReconnectLoop(): Promise<boolean> {
    let failures = 0;
    const signal = this.abort.signal;

    while (!this.stopped) {
      const result = await this.connect();
      if (result.ok) {
        if (failures > 0) {
          this.log.info({ attempts: failures + 1 }, 'Reconnected');
        }
        return true;
      }

      failures++;
      const delay = calculateBackoff(this.reconnectConfig, failures);
      this.log.warn(
        { attempt: failures, kind: result.error.kind, error: result.error.message, retryInMs: delay },
        'Connect failed, retrying',
      );
      await sleep(this.clock, delay, signal);
    }
    return false;
  }

  private setState(next: ConnectionState): void {
    if (this._state === next) return;
    const prev = this._state;
    this._state = next;
    this.emit('stateChange', next, prev);
  }
}
