/**
 * Protocol Module - Public API
 *
 * Command shapes and the field paths used to read results back.
 */

// Types
export type {
  Command,
  CommandArguments,
  EmeterRealtime,
  EnergyReading,
  JsonValue,
  LightState,
  LightStateChange,
  Location,
  ProtocolMethod,
  ProtocolModule,
  RawSysInfo,
  ResponsePayload,
  ResultObject,
  SysInfo,
} from "./schema.js";
export type { ProtocolError } from "./errors.js";
export type { DeviceContext } from "./service.js";

// Schemas
export {
  EmeterRealtimeSchema,
  LightStateSchema,
  METHODS,
  MODULES,
  RawSysInfoSchema,
  ResultObjectSchema,
} from "./schema.js";

// Errors
export {
  deviceError,
  formatProtocolError,
  invalidJson,
  schemaMismatch,
} from "./errors.js";

// Service functions (side effects)
export { querySysInfo, runCommand, sendCommand } from "./service.js";

// Pure transformations
export {
  combineCommands,
  emeterRealtimeCommand,
  extractEnergyReading,
  extractResult,
  extractSysInfo,
  parseResponseBytes,
  rebootCommand,
  setDimmerBrightnessCommand,
  setRelayStateCommand,
  sysInfoCommand,
  toLocation,
  toSysInfo,
  transitionLightStateCommand,
} from "./transform.js";
