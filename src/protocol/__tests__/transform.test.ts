/**
 * Protocol Transform Tests
 *
 * Command builders and response extraction.
 */
import { describe, expect, it } from "vitest";

import { RawSysInfoSchema } from "../schema.js";
import {
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
} from "../transform.js";

const PLUG_SYSINFO = {
  err_code: 0,
  alias: "Desk lamp",
  model: "HS110(EU)",
  sw_ver: "1.2.5 Build 171213 Rel.101523",
  hw_ver: "2.0",
  type: "IOT.SMARTPLUGSWITCH",
  mac: "50:C7:BF:00:00:01",
  dev_name: "Wi-Fi Smart Plug With Energy Monitoring",
  deviceId: "8006TESTDEVICE01",
  rssi: -58,
  active_mode: "schedule",
  relay_state: 1,
  latitude_i: 523700,
  longitude_i: 48900,
};

describe("Protocol Transform", () => {
  // ===========================================================================
  // Command Builders
  // ===========================================================================

  describe("command builders", () => {
    it("builds the sysinfo query", () => {
      expect(sysInfoCommand()).toEqual({ system: { get_sysinfo: {} } });
    });

    it("builds relay commands with 1/0 state", () => {
      expect(setRelayStateCommand(true)).toEqual({
        system: { set_relay_state: { state: 1 } },
      });
      expect(setRelayStateCommand(false)).toEqual({
        system: { set_relay_state: { state: 0 } },
      });
    });

    it("builds the dimmer brightness command", () => {
      expect(setDimmerBrightnessCommand(70)).toEqual({
        "smartlife.iot.dimmer": { set_brightness: { brightness: 70 } },
      });
    });

    it("builds an immediate light transition with only the given fields", () => {
      expect(transitionLightStateCommand({ on: true })).toEqual({
        "smartlife.iot.smartbulb.lightingservice": {
          transition_light_state: {
            ignore_default: 1,
            transition_period: 0,
            on_off: 1,
          },
        },
      });
      expect(transitionLightStateCommand({ brightness: 40 })).toEqual({
        "smartlife.iot.smartbulb.lightingservice": {
          transition_light_state: {
            ignore_default: 1,
            transition_period: 0,
            brightness: 40,
          },
        },
      });
    });

    it("addresses the energy meter and reboot of the given module", () => {
      expect(emeterRealtimeCommand("emeter")).toEqual({
        emeter: { get_realtime: {} },
      });
      expect(rebootCommand("smartlife.iot.common.system", 5)).toEqual({
        "smartlife.iot.common.system": { reboot: { delay: 5 } },
      });
    });

    it("merges commands by module", () => {
      const merged = combineCommands(
        sysInfoCommand(),
        setRelayStateCommand(true),
        emeterRealtimeCommand("emeter"),
      );

      expect(merged).toEqual({
        system: { get_sysinfo: {}, set_relay_state: { state: 1 } },
        emeter: { get_realtime: {} },
      });
    });
  });

  // ===========================================================================
  // parseResponseBytes
  // ===========================================================================

  describe("parseResponseBytes", () => {
    it("parses a JSON object", () => {
      const result = parseResponseBytes(Buffer.from('{"system":{}}'));

      expect(result._unsafeUnwrap()).toEqual({ system: {} });
    });

    it("returns INVALID_JSON for malformed text", () => {
      const result = parseResponseBytes(Buffer.from('{"system":'));

      const error = result._unsafeUnwrapErr();
      expect(error.type).toBe("INVALID_JSON");
      expect(error).toMatchObject({ payload: '{"system":' });
    });

    it("returns INVALID_JSON for JSON that is not an object", () => {
      const result = parseResponseBytes(Buffer.from("[1,2]"));

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "INVALID_JSON",
        message: "Response is not a JSON object",
        payload: "[1,2]",
      });
    });
  });

  // ===========================================================================
  // extractResult
  // ===========================================================================

  describe("extractResult", () => {
    it("returns the result object on err_code 0", () => {
      const response = { system: { set_relay_state: { err_code: 0 } } };

      const result = extractResult(response, "system", "set_relay_state");

      expect(result._unsafeUnwrap()).toEqual({ err_code: 0 });
    });

    it("returns SCHEMA_MISMATCH when the module is missing", () => {
      const result = extractResult({}, "system", "set_relay_state");

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "SCHEMA_MISMATCH",
        message: "Required",
        path: "system",
      });
    });

    it("returns SCHEMA_MISMATCH when the operation is missing", () => {
      const result = extractResult({ system: {} }, "system", "set_relay_state");

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "SCHEMA_MISMATCH",
        message: "Required",
        path: "system.set_relay_state",
      });
    });

    it("returns DEVICE_ERROR for a module-level error", () => {
      const response = {
        "smartlife.iot.dimmer": { err_code: -1, err_msg: "module not support" },
      };

      const result = extractResult(
        response,
        "smartlife.iot.dimmer",
        "set_brightness",
      );

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "DEVICE_ERROR",
        message: "module not support",
        errCode: -1,
      });
    });

    it("returns DEVICE_ERROR for an operation-level error", () => {
      const response = { system: { reboot: { err_code: -3 } } };

      const result = extractResult(response, "system", "reboot");

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "DEVICE_ERROR",
        message: "system.reboot failed",
        errCode: -3,
      });
    });
  });

  // ===========================================================================
  // System Info
  // ===========================================================================

  describe("extractSysInfo", () => {
    it("normalizes a plug sysinfo", () => {
      const result = extractSysInfo({ system: { get_sysinfo: PLUG_SYSINFO } });

      const info = result._unsafeUnwrap();
      expect(info.alias).toBe("Desk lamp");
      expect(info.model).toBe("HS110(EU)");
      expect(info.deviceName).toBe("Wi-Fi Smart Plug With Energy Monitoring");
      expect(info.hardwareType).toBe("IOT.SMARTPLUGSWITCH");
      expect(info.mac).toBe("50:C7:BF:00:00:01");
      expect(info.rssi).toBe(-58);
      expect(info.relayState).toBe(1);
      expect(info.lightState).toBeNull();
      expect(info.location).toEqual({ latitude: 52.37, longitude: 4.89 });
    });

    it("keeps unknown fields in the raw view", () => {
      const result = extractSysInfo({
        system: { get_sysinfo: { ...PLUG_SYSINFO, ntc_state: 0 } },
      });

      expect(result._unsafeUnwrap().raw).toMatchObject({ ntc_state: 0 });
    });

    it("returns SCHEMA_MISMATCH with the path of a missing field", () => {
      const { alias: _alias, ...withoutAlias } = PLUG_SYSINFO;

      const result = extractSysInfo({
        system: { get_sysinfo: withoutAlias },
      });

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "SCHEMA_MISMATCH",
        message: "Required",
        path: "system.get_sysinfo.alias",
      });
    });

    it("returns SCHEMA_MISMATCH for a mistyped field", () => {
      const result = extractSysInfo({
        system: { get_sysinfo: { ...PLUG_SYSINFO, rssi: "weak" } },
      });

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: "SCHEMA_MISMATCH",
        path: "system.get_sysinfo.rssi",
      });
    });
  });

  describe("toSysInfo", () => {
    it("reads the bulb spellings of type, mac and name", () => {
      const raw = RawSysInfoSchema.parse({
        alias: "Hall",
        model: "LB110(EU)",
        mic_type: "IOT.SMARTBULB",
        mic_mac: "50C7BF000002",
        description: "Smart Wi-Fi LED Bulb with Dimmable Light",
        light_state: { on_off: 0, dft_on_state: { brightness: 30 } },
      });

      const info = toSysInfo(raw);

      expect(info.hardwareType).toBe("IOT.SMARTBULB");
      expect(info.mac).toBe("50C7BF000002");
      expect(info.deviceName).toBe("Smart Wi-Fi LED Bulb with Dimmable Light");
      expect(info.lightState?.on_off).toBe(0);
      expect(info.relayState).toBeNull();
      expect(info.location).toBeNull();
    });
  });

  describe("toLocation", () => {
    it("prefers plain degrees", () => {
      const raw = RawSysInfoSchema.parse({
        alias: "a",
        model: "HS100(UK)",
        latitude: 51.5,
        longitude: -0.12,
        latitude_i: 1,
        longitude_i: 1,
      });

      expect(toLocation(raw)).toEqual({ latitude: 51.5, longitude: -0.12 });
    });

    it("returns null without coordinates", () => {
      const raw = RawSysInfoSchema.parse({ alias: "a", model: "HS100(UK)" });

      expect(toLocation(raw)).toBeNull();
    });
  });

  // ===========================================================================
  // Energy Meter
  // ===========================================================================

  describe("extractEnergyReading", () => {
    it("reads base units from older firmware", () => {
      const result = extractEnergyReading(
        { err_code: 0, current: 0.5, voltage: 230.1, power: 115, total: 1.25 },
        "emeter.get_realtime",
      );

      expect(result._unsafeUnwrap()).toEqual({
        powerW: 115,
        voltageV: 230.1,
        currentA: 0.5,
        totalWh: 1250,
      });
    });

    it("converts milli-units from newer firmware", () => {
      const result = extractEnergyReading(
        {
          err_code: 0,
          current_ma: 500,
          voltage_mv: 230100,
          power_mw: 115000,
          total_wh: 1250,
        },
        "emeter.get_realtime",
      );

      expect(result._unsafeUnwrap()).toEqual({
        powerW: 115,
        voltageV: 230.1,
        currentA: 0.5,
        totalWh: 1250,
      });
    });

    it("reports missing optional readings as null", () => {
      const result = extractEnergyReading(
        { err_code: 0, power_mw: 4200 },
        "smartlife.iot.common.emeter.get_realtime",
      );

      expect(result._unsafeUnwrap()).toEqual({
        powerW: 4.2,
        voltageV: null,
        currentA: null,
        totalWh: null,
      });
    });

    it("returns SCHEMA_MISMATCH when power is missing", () => {
      const result = extractEnergyReading(
        { err_code: 0, voltage: 230 },
        "emeter.get_realtime",
      );

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "SCHEMA_MISMATCH",
        message: "Required",
        path: "emeter.get_realtime.power",
      });
    });
  });
});
