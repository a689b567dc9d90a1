import { ConnectError, SendError } from '../errors';
import { FrameSequence } from '../midi-protocol';

/** Destination of the console session */
export interface ControllerAddress {
  readonly host: string;
  readonly port: number;
}

/**
 * The slice of a stream socket the session needs. `netConnector` wraps a
 * net.Socket in it; tests substitute an in-memory socket.
 */
export interface ConsoleSocket {
  /** Resolves once the bytes are handed to the OS, rejects on a write error */
  write(data: Uint8Array): Promise<void>;
  /** Destroy the socket. No close listener fires for a local close. */
  close(): void;
  /** Register the listener for a remote close or socket error. Called at most once. */
  onClose(listener: (err?: Error) => void): void;
}

/** Opens a socket or rejects with a ConnectError */
export type Connector = (address: ControllerAddress, timeoutMs: number) => Promise<ConsoleSocket>;

export type ConnectResult<S> = { ok: true; session: S } | { ok: false; error: ConnectError };

export type SendResult = { ok: true } | { ok: false; error: SendError };

/** Pacing of frames on the wire */
export interface PacingConfig {
  /** Delay after every frame of a sequence unless the frame carries its own gap */
  interFrameDelayMs: number;
}

/** What the dispatcher needs from the transport */
export interface FrameSender {
  send(sequence: FrameSequence): Promise<SendResult>;
}
