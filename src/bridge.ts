/**
 * Footswitch Bridge
 *
 * Wires the foot controller input to the console: input events go through
 * the dispatcher one at a time, the dispatcher sends through the session
 * transport, and the transport keeps itself connected in the background.
 *
 * The input device is reopened after `input.retryDelayMs` whenever it ends
 * or fails (a BLE controller that drops out and re-pairs comes back as the
 * same device path).
 *
 * Emits:
 *   'dispatch' (result: DispatchResult)  after every handled input event
 */

import { EventEmitter } from 'events';
import { Clock, sleep, systemClock } from './clock';
import { BridgeConfig } from './config';
import { OperationDispatcher } from './dispatcher/operation-dispatcher';
import { toError } from './errors';
import { InputStreamFactory, MidiInput } from './input/midi-input';
import { getLogger } from './logger';
import { formatStats } from './session-stats';
import { SessionTransport } from './transport/session-transport';
import { Connector } from './transport/types';

export interface BridgeOptions {
  connector?: Connector;
  openStream?: InputStreamFactory;
  clock?: Clock;
}

export class FootswitchBridge extends EventEmitter {
  readonly transport: SessionTransport;
  readonly dispatcher: OperationDispatcher;
  readonly input: MidiInput;

  private clock: Clock;
  private stopping = false;
  private abort = new AbortController();
  private inputLoop: Promise<void> | null = null;
  private log = getLogger('Bridge');

  constructor(private readonly config: BridgeConfig, options: BridgeOptions = {}) {
    super();
    this.clock = options.clock ?? systemClock;

    this.transport = new SessionTransport({
      ...config.transport,
      connector: options.connector,
      clock: this.clock,
    });
    this.dispatcher = new OperationDispatcher(config.dispatcher, this.transport, undefined, this.clock);
    this.input = new MidiInput({ device: config.input.device, openStream: options.openStream, clock: this.clock });
  }

  start(): void {
    if (this.inputLoop) return;
    const { address } = this.config.transport;
    this.log.info(
      { console: `${address.host}:${address.port}`, input: this.input.device, buttons: this.config.dispatcher.buttons.length },
      'Starting footswitch bridge',
    );

    this.transport.supervise();
    this.inputLoop = this.runInputLoop().catch((err: unknown) => {
      this.log.error({ error: toError(err).message }, 'Input loop failed');
    });
  }

  /** Stop reading input, close the console session and wait for the loop to finish */
  async stop(): Promise<void> {
    if (this.stopping) return;
    this.stopping = true;
    this.log.info('Stopping...');

    this.abort.abort();
    this.input.close();
    this.transport.stop();
    if (this.inputLoop) await this.inputLoop;

    this.log.info({ stats: formatStats(this.transport.getStats()) }, 'Bridge stopped');
  }

  private async runInputLoop(): Promise<void> {
    const { retryDelayMs } = this.config.input;

    while (!this.stopping) {
      try {
        for await (const event of this.input.events()) {
          if (this.stopping) break;
          const result = await this.dispatcher.handle(event);
          this.emit('dispatch', result);
        }
        if (!this.stopping) {
          this.log.warn({ device: this.input.device, retryInMs: retryDelayMs }, 'MIDI input ended');
        }
      } catch (err) {
        if (this.stopping) break;
        this.log.error(
          { device: this.input.device, error: toError(err).message, retryInMs: retryDelayMs },
          'MIDI input failed',
        );
      }

      if (!this.stopping) {
        await sleep(this.clock, retryDelayMs, this.abort.signal);
      }
    }
  }
}
