/**
 * UDP transport backed by a connected `node:dgram` socket.
 *
 * @module transport/udp
 */

import dgram from 'node:dgram';
import { toError } from '../errors/index.js';
import type {
  DatagramTransport,
  SendCallback,
  TransportErrorListener,
} from './interface.js';

/**
 * UdpTransport options
 */
export interface UdpTransportOptions {
  host: string;
  port: number;
  /** Socket type (default: 'udp4') */
  type?: dgram.SocketType;
}

/**
 * Sends each payload as one datagram over a socket connected to a single
 * remote address. There is no reconnection: once the socket fails or is
 * closed every later send fails.
 */
export class UdpTransport implements DatagramTransport {
  private socket?: dgram.Socket;
  private readonly listeners: TransportErrorListener[] = [];

  constructor(private readonly options: UdpTransportOptions) {}

  connect(): Promise<void> {
    if (this.socket) {
      return Promise.reject(new Error('UDP transport is already connected'));
    }

    return new Promise<void>((resolve, reject) => {
      const socket = dgram.createSocket(this.options.type ?? 'udp4');
      let settled = false;

      const fail = (error: Error): void => {
        if (settled) {
          return;
        }
        settled = true;
        socket.removeListener('error', fail);
        try {
          socket.close();
        } catch (closeError) {
          this.emitError(toError(closeError));
        }
        reject(error);
      };

      // The implicit bind inside connect() reports through 'error' and
      // then never runs the queued connect callback.
      socket.once('error', fail);

      try {
        socket.connect(this.options.port, this.options.host, (error?: Error) => {
          if (error) {
            fail(error);
            return;
          }
          if (settled) {
            return;
          }
          settled = true;
          socket.removeListener('error', fail);
          socket.on('error', (socketError) => this.emitError(socketError));
          this.socket = socket;
          resolve();
        });
      } catch (error) {
        fail(toError(error));
      }
    });
  }

  send(payload: Uint8Array, callback: SendCallback): void {
    if (!this.socket) {
      throw new Error('UDP transport is not connected');
    }
    this.socket.send(payload, (error) => callback(error ?? undefined));
  }

  onError(listener: TransportErrorListener): void {
    this.listeners.push(listener);
  }

  close(): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      try {
        socket.close(() => resolve());
      } catch (error) {
        reject(toError(error));
      }
    });
  }

  private emitError(error: Error): void {
    for (const listener of this.listeners) {
      listener(error);
    }
  }
}
