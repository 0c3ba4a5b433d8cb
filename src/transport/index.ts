/**
 * Transport exports
 */

export type {
  DatagramTransport,
  SendCallback,
  TransportErrorListener,
} from './interface.js';
export { UdpTransport } from './udp.js';
export type { UdpTransportOptions } from './udp.js';
