#!/usr/bin/env node
/**
 * kasa-lan - Command-Line Entry Point
 *
 * Usage:
 *   kasa-lan [--json | --long] discover [--timeout <seconds>]
 *   kasa-lan [--json | --long] status <address>...
 *   kasa-lan [--json | --long] reboot [--delay <seconds>] <address>...
 *
 * Addresses are `host` or `host:port`. Results go to stdout, per-device
 * failures and logs to stderr. Discovery always ends after its timeout.
 */
import { parseArgs } from "node:util";

import { DEFAULT_REBOOT_DELAY_SECONDS } from "./capabilities/index.js";
import {
  type CommandReport,
  DEFAULT_DISCOVERY_TIMEOUT_SECONDS,
  MAX_DISCOVERY_TIMEOUT_SECONDS,
  type OutputFormat,
  parseAddress,
  parseSeconds,
  renderReports,
  runDiscover,
  runReboot,
  runStatus,
} from "./cli/index.js";
import { config } from "./config.js";
import { formatDiscoveryError } from "./discovery/index.js";
import { createLogger } from "./logger.js";
import { type DeviceAddress, formatAddress } from "./transport/index.js";

const log = createLogger("cli");

const USAGE = `Usage:
  kasa-lan [--json | --long] discover [--timeout <seconds>]
  kasa-lan [--json | --long] status <address>...
  kasa-lan [--json | --long] reboot [--delay <seconds>] <address>...

  --timeout  discovery window in whole seconds (default 3, at most ${MAX_DISCOVERY_TIMEOUT_SECONDS});
             discovery always stops when it elapses
  --delay    seconds before a reboot takes effect (default 1)`;

function secondsOption(
  name: string,
  value: string | undefined,
  fallback: number,
  max?: number,
): number | null {
  const seconds = parseSeconds(value, fallback, max);
  if (seconds === null) {
    console.error(`Invalid --${name}: ${value ?? ""} (expected whole seconds)`);
    console.error(USAGE);
  }
  return seconds;
}

function print(report: CommandReport, format: OutputFormat): void {
  for (const failure of report.failures) {
    console.error(
      `While querying ${formatAddress(failure.address)}: ${failure.message}`,
    );
  }

  const output = renderReports(report.reports, format);
  if (output !== "") {
    console.log(output);
  }
}

function parseAddresses(values: ReadonlyArray<string>): DeviceAddress[] | null {
  const addresses: DeviceAddress[] = [];
  for (const value of values) {
    const address = parseAddress(value, config.DEVICE_PORT);
    if (address === null) {
      console.error(`Invalid address: ${value}`);
      return null;
    }
    addresses.push(address);
  }
  return addresses;
}

function parseCommandLine(argv: ReadonlyArray<string>) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      json: { type: "boolean", default: false },
      long: { type: "boolean", default: false },
      timeout: { type: "string" },
      delay: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}

async function main(argv: ReadonlyArray<string>): Promise<number> {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    return 2;
  }

  const { values, positionals } = parsed;
  const [command, ...rest] = positionals;

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const format: OutputFormat = values.json
    ? "json"
    : values.long
      ? "long"
      : "short";

  switch (command) {
    case "discover": {
      const seconds = secondsOption(
        "timeout",
        values.timeout,
        DEFAULT_DISCOVERY_TIMEOUT_SECONDS,
        MAX_DISCOVERY_TIMEOUT_SECONDS,
      );
      if (seconds === null) {
        return 2;
      }
      const result = await runDiscover({ timeoutMs: seconds * 1000 });
      if (result.isErr()) {
        console.error(formatDiscoveryError(result.error));
        return 1;
      }
      print(result.value, format);
      return 0;
    }

    case "status":
    case "reboot": {
      const addresses = parseAddresses(rest);
      if (addresses === null || addresses.length === 0) {
        console.error(USAGE);
        return 2;
      }

      const delay = secondsOption(
        "delay",
        values.delay,
        DEFAULT_REBOOT_DELAY_SECONDS,
      );
      if (delay === null) {
        return 2;
      }

      const report =
        command === "status"
          ? await runStatus(addresses)
          : await runReboot(addresses, delay);
      print(report, format);
      return report.failures.length > 0 ? 1 : 0;
    }

    default:
      console.error(USAGE);
      return 2;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    log.fatal({ error }, "Unhandled error");
    process.exitCode = 1;
  },
);
