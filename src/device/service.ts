/**
 * Device Module - Service Layer
 *
 * Variant constructors and the entry points that produce device handles:
 * direct construction, construction with a connectivity check, lookup by
 * address, and resolution of discovery replies.
 */
import { type Result, err, ok } from "neverthrow";

import {
  type CommandError,
  deviceActions,
  dimmerBrightness,
  energyMeter,
  infoQuery,
  lightBrightness,
  lightSwitch,
  relaySwitch,
} from "../capabilities/index.js";
import { type DeviceData, deviceDataSysInfo } from "../discovery/index.js";
import { createLogger } from "../logger.js";
import {
  type DeviceContext,
  MODULES,
  type ProtocolError,
  type SysInfo,
  querySysInfo,
} from "../protocol/index.js";
import {
  type DeviceAddress,
  createTcpTransport,
  formatAddress,
} from "../transport/index.js";
import type {
  Device,
  DeviceConstructor,
  DeviceModel,
  DeviceOptions,
  HS100,
  HS110,
  HS220,
  LB110,
  UnknownDevice,
} from "./schema.js";
import { resolveModel } from "./transform.js";

const log = createLogger("device");

/**
 * A device handle together with the sysinfo it was resolved from.
 */
export type ResolvedDevice = Readonly<{
  device: Device;
  sysinfo: SysInfo;
}>;

function contextFor(
  address: DeviceAddress,
  options: DeviceOptions,
): DeviceContext {
  return { address, transport: options.transport ?? createTcpTransport() };
}

// =============================================================================
// Variant Constructors
// =============================================================================

/**
 * Smart plug.
 */
export function hs100(
  address: DeviceAddress,
  options: DeviceOptions = {},
): HS100 {
  const ctx = contextFor(address, options);
  return {
    model: "HS100",
    address,
    ...infoQuery(ctx),
    ...relaySwitch(ctx),
    ...deviceActions(ctx, MODULES.system),
  };
}

/**
 * Smart plug with energy monitoring.
 */
export function hs110(
  address: DeviceAddress,
  options: DeviceOptions = {},
): HS110 {
  const ctx = contextFor(address, options);
  return {
    model: "HS110",
    address,
    ...infoQuery(ctx),
    ...relaySwitch(ctx),
    ...energyMeter(ctx, MODULES.emeter),
    ...deviceActions(ctx, MODULES.system),
  };
}

/**
 * Dimmable white bulb.
 */
export function lb110(
  address: DeviceAddress,
  options: DeviceOptions = {},
): LB110 {
  const ctx = contextFor(address, options);
  return {
    model: "LB110",
    address,
    ...infoQuery(ctx),
    ...lightSwitch(ctx),
    ...lightBrightness(ctx),
    ...energyMeter(ctx, MODULES.bulbEmeter),
    ...deviceActions(ctx, MODULES.bulbSystem),
  };
}

/**
 * Wall dimmer switch.
 */
export function hs220(
  address: DeviceAddress,
  options: DeviceOptions = {},
): HS220 {
  const ctx = contextFor(address, options);
  return {
    model: "HS220",
    address,
    ...infoQuery(ctx),
    ...relaySwitch(ctx),
    ...dimmerBrightness(ctx),
    ...deviceActions(ctx, MODULES.system),
  };
}

/**
 * Unrecognized hardware: inspectable through the info query only.
 */
export function unknownDevice(
  address: DeviceAddress,
  options: DeviceOptions = {},
): UnknownDevice {
  const ctx = contextFor(address, options);
  return {
    model: "unknown",
    address,
    ...infoQuery(ctx),
  };
}

/**
 * Construct the handle of a variant by tag.
 */
export function createDevice(
  model: DeviceModel,
  address: DeviceAddress,
  options: DeviceOptions = {},
): Device {
  switch (model) {
    case "HS100":
      return hs100(address, options);
    case "HS110":
      return hs110(address, options);
    case "LB110":
      return lb110(address, options);
    case "HS220":
      return hs220(address, options);
    case "unknown":
      return unknownDevice(address, options);
  }
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Resolve the variant from a sysinfo's hardware type. Never fails.
 */
export function resolveDevice(
  address: DeviceAddress,
  sysinfo: SysInfo,
  options: DeviceOptions = {},
): Device {
  return createDevice(resolveModel(sysinfo.model), address, options);
}

/**
 * Construct a known variant and check that it answers an info query.
 *
 * @example
 * const plug = await connectDevice(hs110, { host: "192.168.1.20", port: 9999 });
 * if (plug.isOk()) await plug.value.switchOn();
 */
export async function connectDevice<D extends Device>(
  construct: DeviceConstructor<D>,
  address: DeviceAddress,
  options: DeviceOptions = {},
): Promise<Result<D, CommandError>> {
  const device = construct(address, options);

  const info = await device.sysinfo();
  if (info.isErr()) {
    return err(info.error);
  }

  const reported = resolveModel(info.value.model);
  if (reported !== device.model) {
    log.warn(
      {
        address: formatAddress(address),
        expected: device.model,
        reported: info.value.model,
      },
      "Device reports a different model than requested",
    );
  }

  return ok(device);
}

/**
 * Query a device at an address and resolve its variant.
 */
export async function deviceFromAddress(
  address: DeviceAddress,
  options: DeviceOptions = {},
): Promise<Result<ResolvedDevice, CommandError>> {
  const sysinfo = await querySysInfo(contextFor(address, options));
  if (sysinfo.isErr()) {
    return err(sysinfo.error);
  }

  return ok({
    device: resolveDevice(address, sysinfo.value, options),
    sysinfo: sysinfo.value,
  });
}

/**
 * Resolve the variant of a discovered device.
 */
export function deviceFromData(
  data: DeviceData,
  options: DeviceOptions = {},
): Result<ResolvedDevice, ProtocolError> {
  return deviceDataSysInfo(data).map((sysinfo) => ({
    device: resolveDevice(data.address, sysinfo, options),
    sysinfo,
  }));
}
