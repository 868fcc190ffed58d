/**
 * Transport Module - Schemas and Types
 *
 * Data shapes for addressing devices and exchanging frames with them.
 *
 * Frame layout on the wire:
 * - 4 bytes: big-endian unsigned length N
 * - N bytes: autokey-obfuscated UTF-8 JSON
 */
import type { Result } from "neverthrow";

import type { Command } from "../protocol/schema.js";
import type { TransportError } from "./errors.js";

// =============================================================================
// Framing
// =============================================================================

/**
 * Size of the big-endian length prefix.
 */
export const FRAME_HEADER_BYTES = 4;

/**
 * Whether a UDP datagram carries the length prefix.
 */
export type DatagramFraming = "framed" | "raw";

// =============================================================================
// Addressing
// =============================================================================

/**
 * Network location of a device.
 */
export type DeviceAddress = Readonly<{
  host: string;
  port: number;
}>;

// =============================================================================
// Transport Contract
// =============================================================================

/**
 * TCP transport settings.
 */
export type TcpTransportConfig = Readonly<{
  timeoutMs: number;
  maxFrameBytes: number;
}>;

/**
 * One command in, one decoded response out.
 *
 * Every call is an independent round trip: it opens its own socket and
 * closes it before resolving.
 */
export interface Transport {
  sendAndReceive(
    address: DeviceAddress,
    command: Command,
  ): Promise<Result<Buffer, TransportError>>;
}

// =============================================================================
// UDP Socket
// =============================================================================

/**
 * Sender of a received datagram.
 */
export type RemoteInfo = Readonly<{
  address: string;
  port: number;
}>;

/**
 * The slice of a UDP socket that broadcast and discovery need.
 */
export interface DatagramSocket {
  bind(onListening: () => void): void;
  setBroadcast(flag: boolean): void;
  send(
    message: Buffer,
    port: number,
    address: string,
    onSent: (error: Error | null) => void,
  ): void;
  onMessage(listener: (message: Buffer, remote: RemoteInfo) => void): void;
  onError(listener: (error: Error) => void): void;
  close(): void;
}

/**
 * UDP broadcast settings.
 */
export type BroadcastConfig = Readonly<{
  port: number;
  broadcastAddress: string;
  framing: DatagramFraming;
}>;
