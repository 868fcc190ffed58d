/**
 * Discovery Module - Pure Transformations
 *
 * Reply parsing and the dedupe rule.
 * No side effects, no I/O - just data in, data out.
 */
import type { Result } from "neverthrow";

import {
  type ProtocolError,
  type ResponsePayload,
  type SysInfo,
  extractSysInfo,
  parseResponseBytes,
} from "../protocol/index.js";
import {
  type TransportError,
  decodeDatagram,
  formatAddress,
} from "../transport/index.js";
import {
  type DeviceData,
  type DiscoveryResult,
  MAX_DISCOVERY_WINDOW_MS,
} from "./schema.js";

/**
 * Decode one reply datagram. Only replies carrying a valid sysinfo are
 * accepted.
 */
export function parseReply(
  message: Buffer,
  maxFrameBytes: number,
): Result<ResponsePayload, TransportError | ProtocolError> {
  return decodeDatagram(message, maxFrameBytes)
    .andThen(parseResponseBytes)
    .andThen((payload) => extractSysInfo(payload).map(() => payload));
}

/**
 * Add a reply to the result. A later reply from the same address replaces
 * the earlier one.
 */
export function recordReply(
  result: DiscoveryResult,
  data: DeviceData,
): DiscoveryResult {
  const next = new Map(result);
  next.set(formatAddress(data.address), data);
  return next;
}

/**
 * Normalized sysinfo of a discovered device.
 */
export function deviceDataSysInfo(
  data: DeviceData,
): Result<SysInfo, ProtocolError> {
  return extractSysInfo(data.payload);
}

/**
 * Keep the window inside what a single timer can wait for. Larger delays
 * would fire almost at once.
 */
export function clampWindow(timeoutMs: number): number {
  if (!Number.isFinite(timeoutMs)) {
    return timeoutMs > 0 ? MAX_DISCOVERY_WINDOW_MS : 0;
  }
  return Math.min(Math.max(Math.trunc(timeoutMs), 0), MAX_DISCOVERY_WINDOW_MS);
}
