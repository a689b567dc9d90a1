/**
 * ConsoleEmulator: virtual mixing console on a local TCP port
 *
 * Accepts MIDI-over-TCP sessions the way the desk does and decodes what
 * the bridge writes with the same stream parser the input adapter uses.
 * Used by `--emulate` for a dry run without a desk, and by the
 * integration tests.
 *
 * Tracks:
 *   - NRPN parameter values by "msb/lsb" (value = data MSB << 7 | data LSB)
 *   - soft key activations per note
 *   - liveness bytes received, with timestamps
 *   - connections accepted
 *   - a ring buffer of the last 200 commands
 *
 * Emits:
 *   'connection' (count: number)
 *   'message' (event: MIDIEvent)   every channel message, in arrival order
 *   'liveness' ()
 */

import { EventEmitter } from 'events';
import * as net from 'net';
import { getLogger } from '../logger';
import { MIDIEvent, MIDIStreamParser } from '../midi-parser';
import { STATUS } from '../midi-protocol';

export interface EmulatorLogEntry {
  timestamp: number;
  action: string;
  details: string;
}

export interface ConsoleEmulatorState {
  connections: number;
  activeClients: number;
  livenessCount: number;
  parameters: Record<string, number>;
  keyActivations: Record<string, number>;
}

export interface ConsoleEmulatorOptions {
  /** Byte counted as a liveness pulse */
  livenessByte?: number;
}

function hex(n: number): string {
  return n.toString(16).toUpperCase().padStart(2, '0');
}

export class ConsoleEmulator extends EventEmitter {
  private server: net.Server | null = null;
  private clients: Set<net.Socket> = new Set();
  private parameters: Map<string, number> = new Map();
  private keyActivations: Map<number, number> = new Map();
  private messages: MIDIEvent[] = [];
  private livenessTimes: number[] = [];
  private livenessTotal = 0;
  private connectionCount = 0;
  private _log: EmulatorLogEntry[] = [];
  private readonly maxLogSize = 200;
  private readonly livenessByte: number;
  private logger = getLogger('Emulator');

  constructor(options: ConsoleEmulatorOptions = {}) {
    super();
    this.livenessByte = options.livenessByte ?? STATUS.ACTIVE_SENSING;
  }

  /** Listen on host:port (port 0 picks a free one). Resolves with the bound port. */
  start(port = 0, host = '127.0.0.1'): Promise<number> {
    if (this.server) return Promise.resolve(this.port);

    const server = net.createServer((socket) => this.accept(socket));
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        this.logger.info({ host, port: this.port }, 'Console emulator listening');
        resolve(this.port);
      });
    });
  }

  /** Close every client and the listener */
  stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    this.dropClients();
    if (!server) return Promise.resolve();

    return new Promise((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  /** Port the emulator is bound to, or 0 when not listening */
  get port(): number {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : 0;
  }

  /** Hang up on every connected client, as a desk does when it reboots */
  dropClients(): void {
    for (const socket of this.clients) {
      socket.destroy();
    }
    this.clients.clear();
  }

  getParameter(msb: number, lsb: number): number | undefined {
    return this.parameters.get(`${msb}/${lsb}`);
  }

  getKeyActivations(note: number): number {
    return this.keyActivations.get(note) ?? 0;
  }

  /** Channel messages received, oldest first (the most recent 200) */
  getMessages(): MIDIEvent[] {
    return [...this.messages];
  }

  /** Every liveness pulse since start or reset */
  get livenessCount(): number {
    return this.livenessTotal;
  }

  /** Arrival times of the most recent liveness pulses */
  getLivenessTimes(): number[] {
    return [...this.livenessTimes];
  }

  get connections(): number {
    return this.connectionCount;
  }

  getState(): ConsoleEmulatorState {
    return {
      connections: this.connectionCount,
      activeClients: this.clients.size,
      livenessCount: this.livenessTotal,
      parameters: Object.fromEntries(this.parameters),
      keyActivations: Object.fromEntries(
        Array.from(this.keyActivations, ([note, count]) => [String(note), count]),
      ),
    };
  }

  getLog(): EmulatorLogEntry[] {
    return [...this._log];
  }

  /** Forget everything received; connections stay open */
  reset(): void {
    this.parameters.clear();
    this.keyActivations.clear();
    this.messages = [];
    this.livenessTimes = [];
    this.livenessTotal = 0;
    this._log = [];
  }

  // --- Internals ---

  private accept(socket: net.Socket): void {
    this.connectionCount++;
    this.clients.add(socket);
    const parser = new MIDIStreamParser();
    const peer = `${socket.remoteAddress ?? '?'}:${socket.remotePort ?? '?'}`;
    this.log('Connect', peer);
    this.emit('connection', this.connectionCount);

    socket.on('data', (data: Buffer) => {
      for (const event of parser.feed(data)) {
        this.handle(event);
      }
    });
    socket.on('error', (err) => {
      this.log('Error', `${peer}: ${err.message}`);
    });
    socket.on('close', () => {
      this.clients.delete(socket);
      this.log('Disconnect', peer);
    });
  }

  private handle(event: MIDIEvent): void {
    switch (event.type) {
      case 'realtime':
        if (event.status === this.livenessByte) {
          this.livenessTotal++;
          this.keepRecent(this.livenessTimes, Date.now());
          this.emit('liveness');
        }
        return;

      case 'nrpn': {
        const key = `${event.paramMSB}/${event.paramLSB}`;
        this.parameters.set(key, event.value);
        if (event.fine) this.log('NRPN', `${key} = ${event.value}`);
        return;
      }

      case 'noteon':
        this.keyActivations.set(event.note, (this.keyActivations.get(event.note) ?? 0) + 1);
        this.log('KeyOn', `ch${event.channel + 1} note ${hex(event.note)}`);
        break;

      case 'noteoff':
        this.log('KeyOff', `ch${event.channel + 1} note ${hex(event.note)}`);
        break;

      default:
        break;
    }

    this.keepRecent(this.messages, event);
    this.emit('message', event);
  }

  private keepRecent<T>(list: T[], item: T): void {
    list.push(item);
    if (list.length > this.maxLogSize) {
      list.shift();
    }
  }

  private log(action: string, details: string): void {
    this.keepRecent(this._log, { timestamp: Date.now(), action, details });
    this.logger.debug(`${action}: ${details}`);
  }
}
