/**
 * Capabilities Module - Operation Contracts
 *
 * Each capability is an interface. A device handle's type is the
 * intersection of the capabilities its hardware supports, so calling an
 * unsupported operation does not type-check.
 */
import type { Result } from "neverthrow";

import type { EnergyReading, Location, SysInfo } from "../protocol/index.js";
import type { CommandError } from "./errors.js";

/**
 * Names used by the capability matrix.
 */
export type CapabilityName = "switch" | "dimmer" | "energy" | "actions";

/**
 * Inclusive brightness bounds accepted by {@link Dimmer.setBrightness}.
 */
export const BRIGHTNESS_RANGE = { min: 0, max: 100 } as const;

/**
 * Default reboot delay in seconds.
 */
export const DEFAULT_REBOOT_DELAY_SECONDS = 1;

/**
 * Basic info query; every device supports it, recognized or not.
 */
export interface InfoQuery {
  sysinfo(): Promise<Result<SysInfo, CommandError>>;
}

/**
 * Power control.
 */
export interface Switch {
  isOn(): Promise<Result<boolean, CommandError>>;
  switchOn(): Promise<Result<true, CommandError>>;
  switchOff(): Promise<Result<true, CommandError>>;
}

/**
 * Brightness control, 0-100.
 */
export interface Dimmer {
  brightness(): Promise<Result<number, CommandError>>;
  setBrightness(brightness: number): Promise<Result<true, CommandError>>;
}

/**
 * Instantaneous energy readings.
 */
export interface EnergyMeter {
  realtime(): Promise<Result<EnergyReading, CommandError>>;
}

/**
 * Device housekeeping.
 */
export interface DeviceActions {
  reboot(delaySeconds?: number): Promise<Result<true, CommandError>>;
  location(): Promise<Result<Location, CommandError>>;
}
