/**
 * CLI Module - Public API
 */

// Types
export type {
  ActionOutcome,
  Cell,
  CommandReport,
  DeviceReport,
  OutputFormat,
  QueryFailure,
  Row,
} from "./schema.js";

export {
  DEFAULT_DISCOVERY_TIMEOUT_SECONDS,
  MAX_DISCOVERY_TIMEOUT_SECONDS,
} from "./schema.js";

// Service functions (side effects)
export { runDiscover, runReboot, runStatus } from "./service.js";

// Pure transformations
export {
  formatCell,
  jsonRecord,
  longRow,
  parseAddress,
  parseSeconds,
  renderReports,
  renderTable,
  shortRow,
} from "./transform.js";
