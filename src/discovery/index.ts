/**
 * Discovery Module - Public API
 */

// Types
export type {
  DeviceData,
  DiscoveryOptions,
  DiscoveryResult,
} from "./schema.js";
export { MAX_DISCOVERY_WINDOW_MS } from "./schema.js";
export type { DiscoveryError } from "./errors.js";

// Errors
export { formatDiscoveryError, socketError } from "./errors.js";

// Service functions (side effects)
export { discover } from "./service.js";

// Pure transformations
export {
  clampWindow,
  deviceDataSysInfo,
  parseReply,
  recordReply,
} from "./transform.js";
