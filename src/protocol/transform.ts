/**
 * Protocol Module - Pure Transformations
 *
 * Command builders and response extractors.
 * No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";
import type { z } from "zod";

import {
  type ProtocolError,
  deviceError,
  invalidJson,
  schemaMismatch,
} from "./errors.js";
import {
  type Command,
  type CommandArguments,
  EmeterRealtimeSchema,
  type EnergyReading,
  type LightStateChange,
  type Location,
  METHODS,
  MODULES,
  ModuleResponseSchema,
  type ProtocolModule,
  type RawSysInfo,
  RawSysInfoSchema,
  type ResponsePayload,
  ResponsePayloadSchema,
  type ResultObject,
  ResultObjectSchema,
  type SysInfo,
} from "./schema.js";

/**
 * Fixed-point scale of `latitude_i` / `longitude_i`.
 */
const COORDINATE_SCALE = 10000;

// =============================================================================
// Command Builders
// =============================================================================

/**
 * Query the device self-description.
 *
 * @example
 * sysInfoCommand()
 * // { system: { get_sysinfo: {} } }
 */
export function sysInfoCommand(): Command {
  return { [MODULES.system]: { [METHODS.getSysInfo]: {} } };
}

/**
 * Switch a plug relay.
 *
 * @example
 * setRelayStateCommand(true)
 * // { system: { set_relay_state: { state: 1 } } }
 */
export function setRelayStateCommand(on: boolean): Command {
  return {
    [MODULES.system]: { [METHODS.setRelayState]: { state: on ? 1 : 0 } },
  };
}

/**
 * Set the brightness of a wall dimmer.
 *
 * @example
 * setDimmerBrightnessCommand(70)
 * // { "smartlife.iot.dimmer": { set_brightness: { brightness: 70 } } }
 */
export function setDimmerBrightnessCommand(brightness: number): Command {
  return {
    [MODULES.dimmer]: { [METHODS.setBrightness]: { brightness } },
  };
}

/**
 * Change a bulb's light state immediately.
 */
export function transitionLightStateCommand(change: LightStateChange): Command {
  const args: Record<string, number> = {
    ignore_default: 1,
    transition_period: 0,
  };

  if (change.on !== undefined) {
    args["on_off"] = change.on ? 1 : 0;
  }
  if (change.brightness !== undefined) {
    args["brightness"] = change.brightness;
  }

  return { [MODULES.lighting]: { [METHODS.transitionLightState]: args } };
}

/**
 * Read the energy meter of the given module.
 */
export function emeterRealtimeCommand(module: ProtocolModule): Command {
  return { [module]: { [METHODS.getRealtime]: {} } };
}

/**
 * Reboot the device after `delaySeconds`.
 */
export function rebootCommand(
  module: ProtocolModule,
  delaySeconds: number,
): Command {
  return { [module]: { [METHODS.reboot]: { delay: delaySeconds } } };
}

/**
 * Merge several commands into one payload. Later operations on the same
 * module/operation path replace earlier ones.
 *
 * @example
 * combineCommands(sysInfoCommand(), emeterRealtimeCommand("emeter"))
 * // { system: { get_sysinfo: {} }, emeter: { get_realtime: {} } }
 */
export function combineCommands(...commands: ReadonlyArray<Command>): Command {
  const merged: Record<string, Record<string, CommandArguments>> = {};

  for (const command of commands) {
    for (const [module, operations] of Object.entries(command)) {
      merged[module] = { ...merged[module], ...operations };
    }
  }

  return merged;
}

// =============================================================================
// Response Parsing
// =============================================================================

/**
 * Parse decoded response bytes into a JSON object.
 */
export function parseResponseBytes(
  bytes: Buffer,
): Result<ResponsePayload, ProtocolError> {
  const text = bytes.toString("utf8");

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(invalidJson(message, text));
  }

  const parsed = ResponsePayloadSchema.safeParse(value);
  if (!parsed.success) {
    return err(invalidJson("Response is not a JSON object", text));
  }

  return ok(parsed.data);
}

/**
 * Validate a value against a schema, reporting the first issue with its
 * full dotted path.
 */
function parseAt<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  path: string,
): Result<z.infer<S>, ProtocolError> {
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    return ok(parsed.data);
  }

  const issue = parsed.error.issues[0];
  if (!issue) {
    return err(schemaMismatch("Unexpected shape", path));
  }

  const issuePath =
    issue.path.length > 0 ? `${path}.${issue.path.join(".")}` : path;
  return err(schemaMismatch(issue.message, issuePath));
}

/**
 * Pull the result object for one module/operation out of a response.
 *
 * A non-zero `err_code`, at module or operation level, becomes a
 * DEVICE_ERROR.
 */
export function extractResult(
  response: ResponsePayload,
  module: string,
  method: string,
): Result<ResultObject, ProtocolError> {
  const moduleResult = parseAt(ModuleResponseSchema, response[module], module);
  if (moduleResult.isErr()) {
    return err(moduleResult.error);
  }

  const moduleResponse = moduleResult.value;
  const moduleErrCode = moduleResponse["err_code"];
  if (typeof moduleErrCode === "number" && moduleErrCode !== 0) {
    const moduleErrMsg = moduleResponse["err_msg"];
    return err(
      deviceError(
        typeof moduleErrMsg === "string" ? moduleErrMsg : `${module} failed`,
        moduleErrCode,
      ),
    );
  }

  const path = `${module}.${method}`;
  return parseAt(ResultObjectSchema, moduleResponse[method], path).andThen(
    (result) =>
      result.err_code === 0
        ? ok(result)
        : err(deviceError(result.err_msg ?? `${path} failed`, result.err_code)),
  );
}

// =============================================================================
// System Info
// =============================================================================

/**
 * Extract and normalize `system.get_sysinfo` from a response.
 */
export function extractSysInfo(
  response: ResponsePayload,
): Result<SysInfo, ProtocolError> {
  const path = `${MODULES.system}.${METHODS.getSysInfo}`;
  return extractResult(response, MODULES.system, METHODS.getSysInfo)
    .andThen((result) => parseAt(RawSysInfoSchema, result, path))
    .map(toSysInfo);
}

/**
 * Normalize raw sysinfo field names across plugs and bulbs.
 */
export function toSysInfo(raw: RawSysInfo): SysInfo {
  return {
    alias: raw.alias,
    model: raw.model,
    deviceName: raw.dev_name ?? raw.description ?? null,
    hardwareType: raw.type ?? raw.mic_type ?? null,
    softwareVersion: raw.sw_ver ?? null,
    hardwareVersion: raw.hw_ver ?? null,
    mac: raw.mac ?? raw.mic_mac ?? null,
    deviceId: raw.deviceId ?? null,
    rssi: raw.rssi ?? null,
    activeMode: raw.active_mode ?? null,
    relayState: raw.relay_state ?? null,
    brightness: raw.brightness ?? null,
    lightState: raw.light_state ?? null,
    location: toLocation(raw),
    raw,
  };
}

/**
 * Read the configured position, preferring plain degrees over the
 * fixed-point `_i` fields.
 */
export function toLocation(raw: RawSysInfo): Location | null {
  if (raw.latitude !== undefined && raw.longitude !== undefined) {
    return { latitude: raw.latitude, longitude: raw.longitude };
  }

  if (raw.latitude_i !== undefined && raw.longitude_i !== undefined) {
    return {
      latitude: raw.latitude_i / COORDINATE_SCALE,
      longitude: raw.longitude_i / COORDINATE_SCALE,
    };
  }

  return null;
}

// =============================================================================
// Energy Meter
// =============================================================================

/**
 * Normalize a `get_realtime` result to base units.
 *
 * @param result - The operation result object
 * @param path - Dotted path of the result, for error reporting
 */
export function extractEnergyReading(
  result: ResultObject,
  path: string,
): Result<EnergyReading, ProtocolError> {
  return parseAt(EmeterRealtimeSchema, result, path).andThen((realtime) => {
    const powerW =
      realtime.power ??
      (realtime.power_mw !== undefined ? realtime.power_mw / 1000 : undefined);

    if (powerW === undefined) {
      return err(schemaMismatch("Required", `${path}.power`));
    }

    return ok({
      powerW,
      voltageV:
        realtime.voltage ??
        (realtime.voltage_mv !== undefined
          ? realtime.voltage_mv / 1000
          : null),
      currentA:
        realtime.current ??
        (realtime.current_ma !== undefined
          ? realtime.current_ma / 1000
          : null),
      totalWh:
        realtime.total !== undefined
          ? realtime.total * 1000
          : (realtime.total_wh ?? null),
    });
  });
}
