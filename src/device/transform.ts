/**
 * Device Module - Pure Transformations
 *
 * Model resolution and capability lookups.
 * No side effects, no I/O - just data in, data out.
 */
import type { CapabilityName } from "../capabilities/index.js";
import {
  type Device,
  type DeviceModel,
  KNOWN_MODELS,
  MODEL_CAPABILITIES,
  type WithCapability,
} from "./schema.js";

// =============================================================================
// Resolution
// =============================================================================

/**
 * Map a reported hardware type to a variant tag. Total: unrecognized
 * strings resolve to "unknown".
 *
 * @example
 * resolveModel("HS110(EU)") // "HS110"
 * resolveModel("KL130(US)") // "unknown"
 */
export function resolveModel(hardwareType: string): DeviceModel {
  return (
    KNOWN_MODELS.find((model) => hardwareType.startsWith(model)) ?? "unknown"
  );
}

// =============================================================================
// Capabilities
// =============================================================================

/**
 * Capabilities of a variant.
 */
export function capabilitiesOf(
  model: DeviceModel,
): ReadonlyArray<CapabilityName> {
  return MODEL_CAPABILITIES[model];
}

/**
 * Narrow a device to the variants implementing a capability.
 */
export function hasCapability<C extends CapabilityName>(
  device: Device,
  capability: C,
): device is WithCapability<C> {
  return capabilitiesOf(device.model).includes(capability);
}

export function supportsSwitch(
  device: Device,
): device is WithCapability<"switch"> {
  return hasCapability(device, "switch");
}

export function supportsDimmer(
  device: Device,
): device is WithCapability<"dimmer"> {
  return hasCapability(device, "dimmer");
}

export function supportsEnergy(
  device: Device,
): device is WithCapability<"energy"> {
  return hasCapability(device, "energy");
}

export function supportsActions(
  device: Device,
): device is WithCapability<"actions"> {
  return hasCapability(device, "actions");
}
