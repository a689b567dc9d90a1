import { Clock } from '../../clock';
import { ConnectError, ConnectErrorKind } from '../../errors';
import { ConsoleSocket, Connector, ControllerAddress } from '../../transport/types';

export interface WrittenFrame {
  bytes: number[];
  at: number;
}

/** In-memory ConsoleSocket that records every write with the clock time */
export class MockSocket implements ConsoleSocket {
  readonly writes: WrittenFrame[] = [];
  closed = false;
  /** Set to make every following write reject */
  writeError: Error | null = null;
  private closeListener: ((err?: Error) => void) | null = null;

  constructor(private readonly clock: Clock) {}

  write(data: Uint8Array): Promise<void> {
    if (this.closed) return Promise.reject(new Error('Socket is closed'));
    if (this.writeError) return Promise.reject(this.writeError);
    this.writes.push({ bytes: Array.from(data), at: this.clock.now() });
    return Promise.resolve();
  }

  close(): void {
    this.closed = true;
    this.closeListener = null;
  }

  onClose(listener: (err?: Error) => void): void {
    this.closeListener = listener;
  }

  /** Simulate the console hanging up */
  peerClose(err?: Error): void {
    const listener = this.closeListener;
    this.closeListener = null;
    this.closed = true;
    listener?.(err);
  }

  get frames(): number[][] {
    return this.writes.map((w) => w.bytes);
  }

  get times(): number[] {
    return this.writes.map((w) => w.at);
  }
}

/**
 * Connector stand-in. Fails the first `failures` attempts with `kind`, then
 * hands out a fresh MockSocket per attempt.
 */
export class MockConnector {
  readonly attempts: number[] = [];
  readonly addresses: ControllerAddress[] = [];
  readonly sockets: MockSocket[] = [];

  constructor(
    private readonly clock: Clock,
    private failures = 0,
    private readonly kind: ConnectErrorKind = 'refused',
  ) {}

  get lastSocket(): MockSocket {
    const socket = this.sockets[this.sockets.length - 1];
    if (!socket) throw new Error('No socket has been opened');
    return socket;
  }

  failNext(count: number): void {
    this.failures = count;
  }

  readonly connect: Connector = async (address) => {
    this.attempts.push(this.clock.now());
    this.addresses.push(address);
    if (this.failures > 0) {
      this.failures--;
      throw new ConnectError(this.kind, `Connect to ${address.host}:${address.port} failed: ${this.kind}`);
    }
    const socket = new MockSocket(this.clock);
    this.sockets.push(socket);
    return socket;
  };
}
