/**
 * Capabilities Module - Pure Transformations
 *
 * Argument validation and state readers over SysInfo.
 * No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";

import {
  type Location,
  type ProtocolError,
  type SysInfo,
  schemaMismatch,
} from "../protocol/index.js";
import { type ValidationError, validationError } from "./errors.js";
import { BRIGHTNESS_RANGE } from "./schema.js";

// =============================================================================
// Validation
// =============================================================================

/**
 * Accept integer brightness values within {@link BRIGHTNESS_RANGE}.
 *
 * @example
 * validateBrightness(120)
 * // err({ type: "VALIDATION_ERROR", field: "brightness", ... })
 */
export function validateBrightness(
  value: number,
): Result<number, ValidationError> {
  if (!Number.isInteger(value)) {
    return err(validationError("must be an integer", "brightness", value));
  }

  if (value < BRIGHTNESS_RANGE.min || value > BRIGHTNESS_RANGE.max) {
    return err(
      validationError(
        `must be between ${BRIGHTNESS_RANGE.min} and ${BRIGHTNESS_RANGE.max}, got ${value}`,
        "brightness",
        value,
      ),
    );
  }

  return ok(value);
}

/**
 * Accept a non-negative whole number of seconds.
 */
export function validateRebootDelay(
  seconds: number,
): Result<number, ValidationError> {
  if (!Number.isInteger(seconds) || seconds < 0) {
    return err(
      validationError(
        `must be a non-negative integer number of seconds, got ${seconds}`,
        "delay",
        seconds,
      ),
    );
  }

  return ok(seconds);
}

// =============================================================================
// State Readers
// =============================================================================

const SYSINFO_PATH = "system.get_sysinfo";

/**
 * Plug relay state: `relay_state === 1`.
 */
export function readRelayState(info: SysInfo): Result<boolean, ProtocolError> {
  if (info.relayState === null) {
    return err(schemaMismatch("Required", `${SYSINFO_PATH}.relay_state`));
  }
  return ok(info.relayState === 1);
}

/**
 * Bulb power state: `light_state.on_off === 1`.
 */
export function readLightOn(info: SysInfo): Result<boolean, ProtocolError> {
  if (info.lightState === null) {
    return err(schemaMismatch("Required", `${SYSINFO_PATH}.light_state`));
  }
  return ok(info.lightState.on_off === 1);
}

/**
 * Wall dimmer brightness: top-level `brightness`.
 */
export function readDimmerBrightness(
  info: SysInfo,
): Result<number, ProtocolError> {
  if (info.brightness === null) {
    return err(schemaMismatch("Required", `${SYSINFO_PATH}.brightness`));
  }
  return ok(info.brightness);
}

/**
 * Bulb brightness. While the bulb is off the value it will come back on
 * with is reported under `dft_on_state`.
 */
export function readLightBrightness(
  info: SysInfo,
): Result<number, ProtocolError> {
  const brightness =
    info.lightState?.brightness ?? info.lightState?.dft_on_state?.brightness;

  if (brightness === undefined) {
    return err(
      schemaMismatch("Required", `${SYSINFO_PATH}.light_state.brightness`),
    );
  }
  return ok(brightness);
}

/**
 * Configured position.
 */
export function readLocation(
  info: SysInfo,
): Result<Location, ProtocolError> {
  if (info.location === null) {
    return err(schemaMismatch("Required", `${SYSINFO_PATH}.latitude`));
  }
  return ok(info.location);
}
