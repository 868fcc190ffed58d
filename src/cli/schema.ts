/**
 * CLI Module - Schemas and Types
 *
 * Report rows produced by the command-line front end.
 */
import type { DeviceModel } from "../device/index.js";
import type { Location, SysInfo } from "../protocol/index.js";
import type { DeviceAddress } from "../transport/index.js";

/**
 * Output styles: aligned table (short/long) or one JSON array.
 */
export type OutputFormat = "short" | "long" | "json";

export const DEFAULT_DISCOVERY_TIMEOUT_SECONDS = 3;

/** Longest window a single timer can wait for, in whole seconds */
export const MAX_DISCOVERY_TIMEOUT_SECONDS = 2_147_483;

/**
 * One table cell before stringification.
 */
export type Cell = string | number | boolean | null;

/**
 * Ordered `[column, value]` pairs of one table row.
 */
export type Row = ReadonlyArray<readonly [string, Cell]>;

/**
 * Outcome of an action taken on a device.
 */
export type ActionOutcome = Readonly<{
  name: string;
  /** true on success, "Error: ..." otherwise */
  result: boolean | string;
}>;

/**
 * Everything known about one device for display.
 */
export type DeviceReport = Readonly<{
  address: DeviceAddress;
  model: DeviceModel;
  sysinfo: SysInfo;
  isOn: boolean | null;
  location: Location | null;
  action: ActionOutcome | null;
}>;

/**
 * A device that could not be queried.
 */
export type QueryFailure = Readonly<{
  address: DeviceAddress;
  message: string;
}>;

export type CommandReport = Readonly<{
  reports: ReadonlyArray<DeviceReport>;
  failures: ReadonlyArray<QueryFailure>;
}>;
