/**
 * Datagram transport interface
 */

/**
 * Completion callback for a single send; receives the failure, if any
 */
export type SendCallback = (error?: Error) => void;

/**
 * Listener for errors the transport raises outside of a send call
 */
export type TransportErrorListener = (error: Error) => void;

/**
 * A connected datagram sink.
 *
 * `send` may throw synchronously (e.g. when the socket is no longer
 * running) or report an asynchronous failure through its callback.
 */
export interface DatagramTransport {
  /**
   * Open and connect the underlying socket
   */
  connect(): Promise<void>;

  /**
   * Send one payload as a single datagram
   */
  send(payload: Uint8Array, callback: SendCallback): void;

  /**
   * Register a listener for socket-level errors
   */
  onError(listener: TransportErrorListener): void;

  /**
   * Release the underlying socket
   */
  close(): Promise<void>;
}
