/**
 * Typed configuration - everything tunable comes from the environment,
 * parsed with Zod when the module loads.
 * Loading fails immediately on an invalid value - fail fast.
 *
 * Covers:
 * - Runtime / logging
 * - Device transport (port, timeouts, frame bound)
 * - UDP discovery (broadcast address, window, datagram framing)
 */
import { z } from "zod";

const ConfigSchema = z.object({
  // ==========================================================================
  // Runtime
  // ==========================================================================
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production")
    .describe("Runtime environment"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("warn")
    .describe("Pino log level"),

  // ==========================================================================
  // Transport
  // ==========================================================================
  DEVICE_PORT: z.coerce
    .number()
    .int()
    .min(1)
    .max(65535)
    .default(9999)
    .describe("TCP/UDP port the devices listen on"),
  TCP_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(3000)
    .describe("Connect/read timeout for a TCP round trip (ms)"),
  MAX_FRAME_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(1024 * 1024)
    .describe("Largest response frame accepted before it is rejected"),

  // ==========================================================================
  // Discovery
  // ==========================================================================
  BROADCAST_ADDRESS: z
    .string()
    .ip({ version: "v4" })
    .default("255.255.255.255")
    .describe("Destination of the discovery probe"),
  DISCOVERY_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .max(2_147_483_647)
    .default(3000)
    .describe("How long discovery collects replies (ms)"),
  DISCOVERY_FRAMING: z
    .enum(["framed", "raw"])
    .default("framed")
    .describe("Whether the discovery probe carries the length prefix"),
});

// Parse at load - throws immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  throw new Error("Invalid configuration");
}

export const config = parsed.data;

export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * Settings for the TCP transport.
 */
export function getTransportConfig(): Readonly<{
  port: number;
  timeoutMs: number;
  maxFrameBytes: number;
}> {
  return {
    port: config.DEVICE_PORT,
    timeoutMs: config.TCP_TIMEOUT_MS,
    maxFrameBytes: config.MAX_FRAME_BYTES,
  };
}

/**
 * Settings for UDP discovery.
 */
export function getDiscoveryConfig(): Readonly<{
  port: number;
  broadcastAddress: string;
  timeoutMs: number;
  maxFrameBytes: number;
  framing: "framed" | "raw";
}> {
  return {
    port: config.DEVICE_PORT,
    broadcastAddress: config.BROADCAST_ADDRESS,
    timeoutMs: config.DISCOVERY_TIMEOUT_MS,
    maxFrameBytes: config.MAX_FRAME_BYTES,
    framing: config.DISCOVERY_FRAMING,
  };
}
