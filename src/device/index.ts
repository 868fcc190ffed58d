/**
 * Device Module - Public API
 *
 * Recognized variants, the capability matrix, and the entry points that
 * produce device handles.
 */

// Types
export type {
  CapabilityInterfaces,
  Device,
  DeviceBase,
  DeviceConstructor,
  DeviceModel,
  DeviceOf,
  DeviceOptions,
  HS100,
  HS110,
  HS220,
  KnownModel,
  LB110,
  UnknownDevice,
  WithCapability,
} from "./schema.js";
export type { ResolvedDevice } from "./service.js";

export { KNOWN_MODELS, MODEL_CAPABILITIES } from "./schema.js";

// Service functions
export {
  connectDevice,
  createDevice,
  deviceFromAddress,
  deviceFromData,
  hs100,
  hs110,
  hs220,
  lb110,
  resolveDevice,
  unknownDevice,
} from "./service.js";

// Pure transformations
export {
  capabilitiesOf,
  hasCapability,
  resolveModel,
  supportsActions,
  supportsDimmer,
  supportsEnergy,
  supportsSwitch,
} from "./transform.js";
