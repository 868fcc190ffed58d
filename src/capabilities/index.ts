/**
 * Capabilities Module - Public API
 *
 * Operation contracts and the factories implementing them.
 */

// Types
export type {
  CapabilityName,
  DeviceActions,
  Dimmer,
  EnergyMeter,
  InfoQuery,
  Switch,
} from "./schema.js";
export type { CommandError, ValidationError } from "./errors.js";

export { BRIGHTNESS_RANGE, DEFAULT_REBOOT_DELAY_SECONDS } from "./schema.js";

// Errors
export { formatCommandError, validationError } from "./errors.js";

// Service functions (side effects)
export {
  deviceActions,
  dimmerBrightness,
  energyMeter,
  infoQuery,
  lightBrightness,
  lightSwitch,
  relaySwitch,
} from "./service.js";

// Pure transformations
export {
  readDimmerBrightness,
  readLightBrightness,
  readLightOn,
  readLocation,
  readRelayState,
  validateBrightness,
  validateRebootDelay,
} from "./transform.js";
