/**
 * Transport Module - Public API
 *
 * Framing plus the TCP and UDP forms of the device round trip.
 */

// Types
export type {
  BroadcastConfig,
  DatagramFraming,
  DatagramSocket,
  DeviceAddress,
  RemoteInfo,
  TcpTransportConfig,
  Transport,
} from "./schema.js";
export type { TransportError } from "./errors.js";

export { FRAME_HEADER_BYTES } from "./schema.js";

// Errors
export {
  formatTransportError,
  framingError,
  networkError,
  timeout,
} from "./errors.js";

// Service functions (side effects)
export {
  createTcpTransport,
  createUdpSocket,
  exchangeFrame,
  sendBroadcastProbe,
} from "./service.js";

// Pure transformations
export {
  decodeDatagram,
  decodeFrame,
  encodeDatagram,
  encodeFrame,
  formatAddress,
  readFrameLength,
  serializeCommand,
} from "./transform.js";
