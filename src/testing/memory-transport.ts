/**
 * In-memory transport for testing
 *
 * @module testing/memory-transport
 */

import type {
  DatagramTransport,
  SendCallback,
  TransportErrorListener,
} from '../transport/index.js';

/**
 * Failures a MemoryTransport can be told to produce
 */
export interface MemoryTransportFailures {
  /** Rejects connect() with this error */
  connect?: Error;
  /** Throws this error synchronously from send() */
  send?: Error;
  /** Reports this error through the send callback */
  sendCallback?: Error;
  /** Rejects close() with this error */
  close?: Error;
}

/**
 * Transport that records payloads instead of sending them.
 *
 * After close(), send() throws like a closed socket does.
 */
export class MemoryTransport implements DatagramTransport {
  private readonly payloads: string[] = [];
  private readonly listeners: TransportErrorListener[] = [];
  private connected = false;
  private closed = false;
  private connectCalls = 0;
  private closeCalls = 0;

  constructor(public failures: MemoryTransportFailures = {}) {}

  async connect(): Promise<void> {
    this.connectCalls++;
    if (this.failures.connect) {
      throw this.failures.connect;
    }
    this.connected = true;
  }

  send(payload: Uint8Array, callback: SendCallback): void {
    if (!this.connected || this.closed) {
      throw new Error('Not running');
    }
    if (this.failures.send) {
      throw this.failures.send;
    }

    this.payloads.push(Buffer.from(payload).toString('utf8'));
    callback(this.failures.sendCallback);
  }

  onError(listener: TransportErrorListener): void {
    this.listeners.push(listener);
  }

  async close(): Promise<void> {
    this.closeCalls++;
    this.closed = true;
    if (this.failures.close) {
      throw this.failures.close;
    }
  }

  // ==================== Test Helpers ====================

  /**
   * Raise a socket-level error to registered listeners
   */
  emitError(error: Error): void {
    for (const listener of this.listeners) {
      listener(error);
    }
  }

  /**
   * Lines sent so far, in order
   */
  getSent(): string[] {
    return [...this.payloads];
  }

  /**
   * Most recently sent line
   */
  lastSent(): string | undefined {
    return this.payloads[this.payloads.length - 1];
  }

  getConnectCount(): number {
    return this.connectCalls;
  }

  getCloseCount(): number {
    return this.closeCalls;
  }

  isClosed(): boolean {
    return this.closed;
  }

  reset(): void {
    this.payloads.length = 0;
  }
}
