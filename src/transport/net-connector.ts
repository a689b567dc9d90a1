/**
 * TCP connector for the console's MIDI port.
 *
 * Opens a net.Socket with a connect timeout and classifies failures into
 * ConnectError kinds. The connected socket is wrapped as a ConsoleSocket.
 */

import * as net from 'net';
import { ConnectError, ConnectErrorKind } from '../errors';
import { ConsoleSocket, Connector, ControllerAddress } from './types';

const REFUSED_CODES = new Set(['ECONNREFUSED', 'ECONNRESET']);
const TIMEOUT_CODES = new Set(['ETIMEDOUT']);

function errorCode(err: Error): string | undefined {
  return 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

export function classifyConnectError(err: Error): ConnectErrorKind {
  const code = errorCode(err);
  if (code && REFUSED_CODES.has(code)) return 'refused';
  if (code && TIMEOUT_CODES.has(code)) return 'timeout';
  return 'unreachable';
}

class NetConsoleSocket implements ConsoleSocket {
  private closeListener: ((err?: Error) => void) | null = null;
  private closed = false;
  private lastError: Error | undefined;

  constructor(private readonly socket: net.Socket) {
    socket.setNoDelay(true);
    socket.on('error', (err: Error) => {
      // 'close' always follows 'error'; report it there
      this.lastError = err;
    });
    socket.on('close', () => this.notifyClose(this.lastError ?? new Error('Connection closed by peer')));
  }

  write(data: Uint8Array): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.closed || this.socket.destroyed) {
        reject(new Error('Socket is closed'));
        return;
      }
      this.socket.write(data, (err?: Error | null) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  close(): void {
    this.closed = true;
    this.closeListener = null;
    this.socket.removeAllListeners();
    // Swallow late errors from the destroyed socket
    this.socket.on('error', () => undefined);
    this.socket.destroy();
  }

  onClose(listener: (err?: Error) => void): void {
    this.closeListener = listener;
  }

  private notifyClose(err?: Error): void {
    if (this.closed) return;
    this.closed = true;
    const listener = this.closeListener;
    this.closeListener = null;
    listener?.(err);
  }
}

/** Default Connector over node:net */
export const netConnector: Connector = (address: ControllerAddress, timeoutMs: number) =>
  new Promise<ConsoleSocket>((resolve, reject) => {
    const socket = new net.Socket();

    const fail = (err: ConnectError): void => {
      clearTimeout(timer);
      socket.removeAllListeners();
      socket.on('error', () => undefined);
      socket.destroy();
      reject(err);
    };

    const timer = setTimeout(() => {
      fail(new ConnectError('timeout', `Connect to ${address.host}:${address.port} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    socket.once('error', (err: Error) => {
      fail(new ConnectError(classifyConnectError(err), `Connect to ${address.host}:${address.port} failed: ${err.message}`));
    });

    socket.connect(address.port, address.host, () => {
      clearTimeout(timer);
      socket.removeAllListeners('error');
      resolve(new NetConsoleSocket(socket));
    });
  });
