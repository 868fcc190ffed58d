/**
 * Capabilities Module - Service Layer
 *
 * Capability implementations. Each factory takes the context of one device
 * and returns the methods of one capability; device constructors compose
 * the factories their hardware supports.
 *
 * Every method is build command → send → extract. Arguments are validated
 * before anything is sent.
 */
import { type Result, err } from "neverthrow";

import { createLogger } from "../logger.js";
import {
  type DeviceContext,
  METHODS,
  MODULES,
  type ProtocolModule,
  emeterRealtimeCommand,
  extractEnergyReading,
  querySysInfo,
  rebootCommand,
  runCommand,
  setDimmerBrightnessCommand,
  setRelayStateCommand,
  transitionLightStateCommand,
} from "../protocol/index.js";
import { formatAddress } from "../transport/index.js";
import type { CommandError } from "./errors.js";
import {
  DEFAULT_REBOOT_DELAY_SECONDS,
  type DeviceActions,
  type Dimmer,
  type EnergyMeter,
  type InfoQuery,
  type Switch,
} from "./schema.js";
import {
  readDimmerBrightness,
  readLightBrightness,
  readLightOn,
  readLocation,
  readRelayState,
  validateBrightness,
  validateRebootDelay,
} from "./transform.js";

const log = createLogger("device");

// =============================================================================
// Info
// =============================================================================

export function infoQuery(ctx: DeviceContext): InfoQuery {
  return {
    sysinfo: () => querySysInfo(ctx),
  };
}

// =============================================================================
// Switch
// =============================================================================

/**
 * Power control through the plug relay (`system.set_relay_state`).
 */
export function relaySwitch(ctx: DeviceContext): Switch {
  const setRelay = async (on: boolean): Promise<Result<true, CommandError>> => {
    log.debug({ address: formatAddress(ctx.address), on }, "Setting relay");
    const result = await runCommand(
      ctx,
      setRelayStateCommand(on),
      MODULES.system,
      METHODS.setRelayState,
    );
    return result.map(() => true as const);
  };

  return {
    isOn: async () => (await querySysInfo(ctx)).andThen(readRelayState),
    switchOn: () => setRelay(true),
    switchOff: () => setRelay(false),
  };
}

/**
 * Power control through the bulb lighting service.
 */
export function lightSwitch(ctx: DeviceContext): Switch {
  const setLight = async (on: boolean): Promise<Result<true, CommandError>> => {
    log.debug({ address: formatAddress(ctx.address), on }, "Setting light");
    const result = await runCommand(
      ctx,
      transitionLightStateCommand({ on }),
      MODULES.lighting,
      METHODS.transitionLightState,
    );
    return result.map(() => true as const);
  };

  return {
    isOn: async () => (await querySysInfo(ctx)).andThen(readLightOn),
    switchOn: () => setLight(true),
    switchOff: () => setLight(false),
  };
}

// =============================================================================
// Dimmer
// =============================================================================

/**
 * Brightness of a wall dimmer (`smartlife.iot.dimmer`).
 */
export function dimmerBrightness(ctx: DeviceContext): Dimmer {
  return {
    brightness: async () =>
      (await querySysInfo(ctx)).andThen(readDimmerBrightness),

    setBrightness: async (brightness) => {
      const valid = validateBrightness(brightness);
      if (valid.isErr()) {
        return err(valid.error);
      }

      log.debug(
        { address: formatAddress(ctx.address), brightness: valid.value },
        "Setting dimmer brightness",
      );
      const result = await runCommand(
        ctx,
        setDimmerBrightnessCommand(valid.value),
        MODULES.dimmer,
        METHODS.setBrightness,
      );
      return result.map(() => true as const);
    },
  };
}

/**
 * Brightness of a bulb (lighting service).
 */
export function lightBrightness(ctx: DeviceContext): Dimmer {
  return {
    brightness: async () =>
      (await querySysInfo(ctx)).andThen(readLightBrightness),

    setBrightness: async (brightness) => {
      const valid = validateBrightness(brightness);
      if (valid.isErr()) {
        return err(valid.error);
      }

      log.debug(
        { address: formatAddress(ctx.address), brightness: valid.value },
        "Setting light brightness",
      );
      const result = await runCommand(
        ctx,
        transitionLightStateCommand({ brightness: valid.value }),
        MODULES.lighting,
        METHODS.transitionLightState,
      );
      return result.map(() => true as const);
    },
  };
}

// =============================================================================
// Energy Meter
// =============================================================================

/**
 * Realtime energy readings from the given meter module
 * (`emeter` on plugs, `smartlife.iot.common.emeter` on bulbs).
 */
export function energyMeter(
  ctx: DeviceContext,
  module: ProtocolModule,
): EnergyMeter {
  return {
    realtime: async () => {
      const result = await runCommand(
        ctx,
        emeterRealtimeCommand(module),
        module,
        METHODS.getRealtime,
      );
      return result.andThen((realtime) =>
        extractEnergyReading(realtime, `${module}.${METHODS.getRealtime}`),
      );
    },
  };
}

// =============================================================================
// Device Actions
// =============================================================================

/**
 * Reboot and location, with reboot sent to the given system module
 * (`system` on plugs, `smartlife.iot.common.system` on bulbs).
 */
export function deviceActions(
  ctx: DeviceContext,
  systemModule: ProtocolModule,
): DeviceActions {
  return {
    reboot: async (delaySeconds = DEFAULT_REBOOT_DELAY_SECONDS) => {
      const valid = validateRebootDelay(delaySeconds);
      if (valid.isErr()) {
        return err(valid.error);
      }

      log.info(
        { address: formatAddress(ctx.address), delaySeconds: valid.value },
        "Rebooting device",
      );
      const result = await runCommand(
        ctx,
        rebootCommand(systemModule, valid.value),
        systemModule,
        METHODS.reboot,
      );
      return result.map(() => true as const);
    },

    location: async () => (await querySysInfo(ctx)).andThen(readLocation),
  };
}
