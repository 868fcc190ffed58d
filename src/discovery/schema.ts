/**
 * Discovery Module - Schemas and Types
 *
 * Data shapes for UDP broadcast discovery.
 */
import type { ResponsePayload } from "../protocol/index.js";
import type {
  DatagramFraming,
  DatagramSocket,
  DeviceAddress,
} from "../transport/index.js";

/** Longest delay a Node timer accepts (2^31 - 1 ms) */
export const MAX_DISCOVERY_WINDOW_MS = 2_147_483_647;

/**
 * A device address paired with its most recent raw reply.
 */
export type DeviceData = Readonly<{
  address: DeviceAddress;
  /** Decoded reply, before SysInfo normalization */
  payload: ResponsePayload;
  /** Epoch ms when the reply arrived */
  receivedAt: number;
}>;

/**
 * Replies keyed by `host:port` of the sender.
 */
export type DiscoveryResult = ReadonlyMap<string, DeviceData>;

/**
 * Overrides for a single discovery run. Defaults come from the environment.
 */
export type DiscoveryOptions = Readonly<{
  /** Collection window in ms */
  timeoutMs?: number;
  broadcastAddress?: string;
  port?: number;
  framing?: DatagramFraming;
  createSocket?: () => DatagramSocket;
}>;
