/**
 * CLI Module - Pure Transformations
 *
 * Argument parsing and report rendering.
 * No side effects, no I/O - just data in, data out.
 */
import { formatAddress } from "../transport/index.js";
import type { DeviceAddress } from "../transport/index.js";
import type { Cell, DeviceReport, OutputFormat, Row } from "./schema.js";

// =============================================================================
// Arguments
// =============================================================================

/**
 * Parse `host` or `host:port`. A value with several colons is taken as a
 * bare IPv6 host.
 *
 * @returns The address, or null when the port is not a valid port number
 *
 * @example
 * parseAddress("192.168.1.20", 9999) // { host: "192.168.1.20", port: 9999 }
 * parseAddress("192.168.1.20:80", 9999) // { host: "192.168.1.20", port: 80 }
 */
export function parseAddress(
  value: string,
  defaultPort: number,
): DeviceAddress | null {
  const text = value.trim();
  const colons = text.split(":").length - 1;

  if (colons !== 1) {
    return text === "" ? null : { host: text, port: defaultPort };
  }

  const [host = "", portText = ""] = text.split(":");
  if (host === "" || !/^\d+$/.test(portText)) {
    return null;
  }

  const port = Number.parseInt(portText, 10);
  if (port < 1 || port > 65535) {
    return null;
  }

  return { host, port };
}

/**
 * Parse a whole number of seconds, capped at `max`.
 *
 * @returns `fallback` when no value was given, null when it is not a whole
 * number
 */
export function parseSeconds(
  value: string | undefined,
  fallback: number,
  max: number = Number.MAX_SAFE_INTEGER,
): number | null {
  if (value === undefined) {
    return fallback;
  }
  if (!/^\d+$/.test(value)) {
    return null;
  }
  return Math.min(Number.parseInt(value, 10), max);
}

// =============================================================================
// Rows
// =============================================================================

function signal(report: DeviceReport): string | null {
  return report.sysinfo.rssi === null ? null : `${report.sysinfo.rssi} dB`;
}

/**
 * Compact row: identity plus power state, or identity plus action outcome.
 */
export function shortRow(report: DeviceReport): Row {
  const { sysinfo } = report;
  const identity: Row = [
    ["Address", formatAddress(report.address)],
    ["Alias", sysinfo.alias],
    ["Product", sysinfo.deviceName],
    ["Model", sysinfo.model],
  ];

  if (report.action) {
    return [...identity, [report.action.name, report.action.result]];
  }

  return [...identity, ["Signal", signal(report)], ["On?", report.isOn]];
}

/**
 * Detailed row.
 */
export function longRow(report: DeviceReport): Row {
  const { sysinfo } = report;
  const identity: Row = [
    ["Address", formatAddress(report.address)],
    ["MAC", sysinfo.mac],
    ["Alias", sysinfo.alias],
    ["Product", sysinfo.deviceName],
    ["Type", sysinfo.hardwareType],
    ["Model", sysinfo.model],
    ["Version", sysinfo.softwareVersion],
  ];

  if (report.action) {
    return [...identity, [report.action.name, report.action.result]];
  }

  return [
    ...identity,
    ["Signal", signal(report)],
    ["Latitude", report.location?.latitude ?? null],
    ["Longitude", report.location?.longitude ?? null],
    ["Mode", sysinfo.activeMode],
    ["On?", report.isOn],
  ];
}

/**
 * Machine-readable record.
 */
export function jsonRecord(report: DeviceReport): Record<string, unknown> {
  const base = {
    addr: formatAddress(report.address),
    device: report.model,
  };

  if (report.action) {
    return {
      ...base,
      actioned: { action: report.action.name, result: report.action.result },
      data: { system: report.sysinfo.raw },
    };
  }

  return {
    ...base,
    on: report.isOn,
    data: { system: report.sysinfo.raw, location: report.location },
  };
}

// =============================================================================
// Rendering
// =============================================================================

/**
 * Stringify a cell. Missing values show as "-".
 */
export function formatCell(cell: Cell): string {
  return cell === null ? "-" : String(cell);
}

/**
 * Render rows as an aligned table: header, separator, one line per row.
 * Columns appear in first-seen order; each is as wide as its widest value
 * or its title.
 *
 * @example
 * renderTable([[["Alias", "Lamp"], ["On?", true]]])
 * // " Alias | On?  "
 * // "-------+------"
 * // " Lamp  | true "
 */
export function renderTable(rows: ReadonlyArray<Row>): string {
  if (rows.length === 0) {
    return "";
  }

  const widths = new Map<string, number>();
  const lines = rows.map((row) => {
    const cells = new Map<string, string>();
    for (const [column, cell] of row) {
      const text = formatCell(cell);
      cells.set(column, text);
      widths.set(
        column,
        Math.max(widths.get(column) ?? column.length, text.length),
      );
    }
    return cells;
  });

  const columns = [...widths.entries()];
  const join = (values: ReadonlyArray<string>): string =>
    ` ${values.join(" | ")} `;

  const header = join(columns.map(([column, width]) => column.padEnd(width)));
  const separator = `-${columns.map(([, width]) => "-".repeat(width)).join("-+-")}-`;
  const body = lines.map((cells) =>
    join(
      columns.map(([column, width]) => (cells.get(column) ?? "-").padEnd(width)),
    ),
  );

  return [header, separator, ...body].join("\n");
}

/**
 * Render reports in the requested format.
 */
export function renderReports(
  reports: ReadonlyArray<DeviceReport>,
  format: OutputFormat,
): string {
  switch (format) {
    case "json":
      return JSON.stringify(reports.map(jsonRecord));
    case "long":
      return renderTable(reports.map(longRow));
    case "short":
      return renderTable(reports.map(shortRow));
  }
}
