/**
 * CLI Module - Service Layer
 *
 * The three commands of the command-line front end. Devices are queried
 * concurrently; a device that cannot be queried is reported as a failure
 * and does not stop the others.
 */
import { type Result, err, ok } from "neverthrow";

import {
  type CommandError,
  formatCommandError,
} from "../capabilities/index.js";
import {
  type Device,
  type DeviceOptions,
  type ResolvedDevice,
  deviceFromAddress,
  deviceFromData,
  supportsActions,
  supportsSwitch,
} from "../device/index.js";
import {
  type DiscoveryError,
  type DiscoveryOptions,
  discover,
} from "../discovery/index.js";
import { createLogger } from "../logger.js";
import { type DeviceAddress, formatAddress } from "../transport/index.js";
import type {
  ActionOutcome,
  CommandReport,
  DeviceReport,
  QueryFailure,
} from "./schema.js";

const log = createLogger("cli");

type Outcome = Result<DeviceReport, QueryFailure>;

function collect(outcomes: ReadonlyArray<Outcome>): CommandReport {
  const reports: DeviceReport[] = [];
  const failures: QueryFailure[] = [];

  for (const outcome of outcomes) {
    outcome.match(
      (report) => reports.push(report),
      (failure) => failures.push(failure),
    );
  }

  return { reports, failures };
}

function failure(address: DeviceAddress, error: CommandError): QueryFailure {
  return { address, message: formatCommandError(error) };
}

async function powerState(
  device: Device,
): Promise<Result<boolean | null, CommandError>> {
  return supportsSwitch(device) ? device.isOn() : ok(null);
}

async function statusReport(resolved: ResolvedDevice): Promise<Outcome> {
  const { device, sysinfo } = resolved;

  const isOn = await powerState(device);
  if (isOn.isErr()) {
    return err(failure(device.address, isOn.error));
  }

  return ok({
    address: device.address,
    model: device.model,
    sysinfo,
    isOn: isOn.value,
    location: sysinfo.location,
    action: null,
  });
}

// =============================================================================
// Commands
// =============================================================================

/**
 * Discover devices and report the state of each.
 */
export async function runDiscover(
  discovery: DiscoveryOptions = {},
  options: DeviceOptions = {},
): Promise<Result<CommandReport, DiscoveryError>> {
  const found = await discover(discovery);
  if (found.isErr()) {
    return err(found.error);
  }

  const outcomes = await Promise.all(
    [...found.value.values()].map(async (data): Promise<Outcome> => {
      const resolved = deviceFromData(data, options);
      if (resolved.isErr()) {
        return err(failure(data.address, resolved.error));
      }
      return statusReport(resolved.value);
    }),
  );

  return ok(collect(outcomes));
}

/**
 * Query each address and report its state.
 */
export async function runStatus(
  addresses: ReadonlyArray<DeviceAddress>,
  options: DeviceOptions = {},
): Promise<CommandReport> {
  const outcomes = await Promise.all(
    addresses.map(async (address): Promise<Outcome> => {
      const resolved = await deviceFromAddress(address, options);
      if (resolved.isErr()) {
        return err(failure(address, resolved.error));
      }
      return statusReport(resolved.value);
    }),
  );

  return collect(outcomes);
}

/**
 * Reboot each address after `delaySeconds`.
 *
 * A device that answers but refuses or does not support the reboot is
 * still reported, with the error in its action column.
 */
export async function runReboot(
  addresses: ReadonlyArray<DeviceAddress>,
  delaySeconds: number,
  options: DeviceOptions = {},
): Promise<CommandReport> {
  const outcomes = await Promise.all(
    addresses.map(async (address): Promise<Outcome> => {
      const resolved = await deviceFromAddress(address, options);
      if (resolved.isErr()) {
        return err(failure(address, resolved.error));
      }

      const { device, sysinfo } = resolved.value;
      const action = await reboot(device, delaySeconds);
      log.info(
        { address: formatAddress(address), result: action.result },
        "Reboot requested",
      );

      return ok({
        address,
        model: device.model,
        sysinfo,
        isOn: null,
        location: null,
        action,
      });
    }),
  );

  return collect(outcomes);
}

async function reboot(
  device: Device,
  delaySeconds: number,
): Promise<ActionOutcome> {
  const name = "Rebooted?";

  if (!supportsActions(device)) {
    return { name, result: "Error: reboot is not supported by this device" };
  }

  const result = await device.reboot(delaySeconds);
  return {
    name,
    result: result.match(
      () => true,
      (error) => `Error: ${formatCommandError(error)}`,
    ),
  };
}
