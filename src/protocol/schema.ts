/**
 * Protocol Module - Schemas and Types
 *
 * Command shapes, response shapes and the normalized views built from them.
 * Response schemas are the source of truth - types derived with z.infer<>.
 * Every response schema passes unknown fields through untouched, so new
 * firmware fields never break parsing.
 */
import { z } from "zod";

// =============================================================================
// Commands
// =============================================================================

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | ReadonlyArray<JsonValue>
  | { readonly [key: string]: JsonValue };

/**
 * Arguments of one operation, e.g. `{ state: 1 }`.
 */
export type CommandArguments = Readonly<Record<string, JsonValue>>;

/**
 * Module → operation → arguments.
 *
 * @example
 * { system: { set_relay_state: { state: 1 } } }
 */
export type Command = Readonly<
  Record<string, Readonly<Record<string, CommandArguments>>>
>;

/**
 * Functional modules addressed by commands.
 */
export const MODULES = {
  system: "system",
  emeter: "emeter",
  dimmer: "smartlife.iot.dimmer",
  lighting: "smartlife.iot.smartbulb.lightingservice",
  bulbEmeter: "smartlife.iot.common.emeter",
  bulbSystem: "smartlife.iot.common.system",
} as const;

export type ProtocolModule = (typeof MODULES)[keyof typeof MODULES];

/**
 * Operations addressed by commands.
 */
export const METHODS = {
  getSysInfo: "get_sysinfo",
  setRelayState: "set_relay_state",
  setBrightness: "set_brightness",
  transitionLightState: "transition_light_state",
  getRealtime: "get_realtime",
  reboot: "reboot",
} as const;

export type ProtocolMethod = (typeof METHODS)[keyof typeof METHODS];

/**
 * Requested change of a bulb's light state. Absent fields stay as they are.
 */
export type LightStateChange = Readonly<{
  on?: boolean;
  brightness?: number;
}>;

// =============================================================================
// Response Envelope
// =============================================================================

/**
 * Any decoded response: a JSON object keyed by module.
 */
export const ResponsePayloadSchema = z.record(z.string(), z.unknown());

export type ResponsePayload = Readonly<z.infer<typeof ResponsePayloadSchema>>;

/**
 * The object under one module key.
 */
export const ModuleResponseSchema = z.record(z.string(), z.unknown());

/**
 * The object under one module/operation path. `err_code` 0 means success.
 */
export const ResultObjectSchema = z
  .object({
    err_code: z.number().int(),
    err_msg: z.string().optional(),
  })
  .passthrough();

export type ResultObject = Readonly<z.infer<typeof ResultObjectSchema>>;

// =============================================================================
// System Info
// =============================================================================

/**
 * Light state reported by bulbs. While the bulb is off the last "on"
 * settings live under `dft_on_state`.
 */
export const LightStateSchema = z
  .object({
    on_off: z.number().int(),
    brightness: z.number().optional(),
    hue: z.number().optional(),
    saturation: z.number().optional(),
    color_temp: z.number().optional(),
    mode: z.string().optional(),
    dft_on_state: z
      .object({
        brightness: z.number().optional(),
        hue: z.number().optional(),
        saturation: z.number().optional(),
        color_temp: z.number().optional(),
        mode: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type LightState = Readonly<z.infer<typeof LightStateSchema>>;

/**
 * `system.get_sysinfo` result as the device reports it.
 * Plugs and bulbs name a few fields differently (`type`/`mic_type`,
 * `mac`/`mic_mac`, `dev_name`/`description`).
 */
export const RawSysInfoSchema = z
  .object({
    alias: z.string(),
    model: z.string(),
    sw_ver: z.string().optional(),
    hw_ver: z.string().optional(),
    type: z.string().optional(),
    mic_type: z.string().optional(),
    mac: z.string().optional(),
    mic_mac: z.string().optional(),
    dev_name: z.string().optional(),
    description: z.string().optional(),
    deviceId: z.string().optional(),
    rssi: z.number().optional(),
    active_mode: z.string().optional(),
    relay_state: z.number().int().optional(),
    on_time: z.number().optional(),
    led_off: z.number().int().optional(),
    brightness: z.number().optional(),
    latitude: z.number().optional(),
    longitude: z.number().optional(),
    latitude_i: z.number().optional(),
    longitude_i: z.number().optional(),
    light_state: LightStateSchema.optional(),
  })
  .passthrough();

export type RawSysInfo = Readonly<z.infer<typeof RawSysInfoSchema>>;

/**
 * Geographic position configured on the device.
 */
export type Location = Readonly<{
  latitude: number;
  longitude: number;
}>;

/**
 * Normalized, immutable device self-description.
 */
export type SysInfo = Readonly<{
  alias: string;
  /** Hardware type / model string, e.g. "HS110(EU)" */
  model: string;
  deviceName: string | null;
  hardwareType: string | null;
  softwareVersion: string | null;
  hardwareVersion: string | null;
  mac: string | null;
  deviceId: string | null;
  /** Wi-Fi signal strength in dB */
  rssi: number | null;
  activeMode: string | null;
  /** 1 = on, 0 = off; plugs only */
  relayState: number | null;
  /** 0-100; wall dimmers only */
  brightness: number | null;
  /** Bulbs only */
  lightState: LightState | null;
  location: Location | null;
  raw: RawSysInfo;
}>;

// =============================================================================
// Energy Meter
// =============================================================================

/**
 * `get_realtime` result. Older firmware reports amps/volts/watts/kWh,
 * newer firmware milli-units and Wh.
 */
export const EmeterRealtimeSchema = z
  .object({
    current: z.number().optional(),
    voltage: z.number().optional(),
    power: z.number().optional(),
    total: z.number().optional(),
    current_ma: z.number().optional(),
    voltage_mv: z.number().optional(),
    power_mw: z.number().optional(),
    total_wh: z.number().optional(),
  })
  .passthrough();

export type EmeterRealtime = Readonly<z.infer<typeof EmeterRealtimeSchema>>;

/**
 * Instantaneous energy reading in base units.
 */
export type EnergyReading = Readonly<{
  powerW: number;
  voltageV: number | null;
  currentA: number | null;
  totalWh: number | null;
}>;
