/**
 * Protocol Module - Service Layer
 *
 * Runs commands against one device through its transport and pulls the
 * expected result out of the reply.
 */
import { type Result, err } from "neverthrow";

import { createLogger } from "../logger.js";
import type {
  DeviceAddress,
  Transport,
  TransportError,
} from "../transport/index.js";
import { formatAddress } from "../transport/index.js";
import type { ProtocolError } from "./errors.js";
import type {
  Command,
  ResponsePayload,
  ResultObject,
  SysInfo,
} from "./schema.js";
import {
  extractResult,
  extractSysInfo,
  parseResponseBytes,
  sysInfoCommand,
} from "./transform.js";

const log = createLogger("protocol");

/**
 * Everything needed to reach one device.
 */
export type DeviceContext = Readonly<{
  address: DeviceAddress;
  transport: Transport;
}>;

/**
 * Send a command and parse the reply as JSON.
 */
export async function sendCommand(
  ctx: DeviceContext,
  command: Command,
): Promise<Result<ResponsePayload, TransportError | ProtocolError>> {
  log.trace({ address: formatAddress(ctx.address), command }, "Sending command");

  const response = await ctx.transport.sendAndReceive(ctx.address, command);
  if (response.isErr()) {
    return err(response.error);
  }

  return parseResponseBytes(response.value);
}

/**
 * Send a command and extract the result object of one module/operation.
 */
export async function runCommand(
  ctx: DeviceContext,
  command: Command,
  module: string,
  method: string,
): Promise<Result<ResultObject, TransportError | ProtocolError>> {
  const response = await sendCommand(ctx, command);
  if (response.isErr()) {
    return err(response.error);
  }

  return extractResult(response.value, module, method);
}

/**
 * Query and normalize the device self-description.
 */
export async function querySysInfo(
  ctx: DeviceContext,
): Promise<Result<SysInfo, TransportError | ProtocolError>> {
  const response = await sendCommand(ctx, sysInfoCommand());
  if (response.isErr()) {
    return err(response.error);
  }

  return extractSysInfo(response.value);
}
