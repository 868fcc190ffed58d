/**
 * Discovery Module - Service Layer
 *
 * Broadcasts one sysinfo probe and collects replies until the window
 * closes. Ends on elapsed time only; the number of devices is not known
 * in advance.
 */
import { type Result, err, ok } from "neverthrow";

import { formatCommandError } from "../capabilities/index.js";
import { getDiscoveryConfig } from "../config.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import { sysInfoCommand } from "../protocol/index.js";
import {
  type BroadcastConfig,
  type DatagramSocket,
  createUdpSocket,
  formatTransportError,
  sendBroadcastProbe,
} from "../transport/index.js";
import { type DiscoveryError, socketError } from "./errors.js";
import type { DiscoveryOptions, DiscoveryResult } from "./schema.js";
import { clampWindow, parseReply, recordReply } from "./transform.js";

const log = createLogger("discovery");

/**
 * Discover devices on the local network.
 *
 * Malformed replies are logged and dropped. Only a failure of the
 * discovery socket itself fails the call.
 *
 * @param options - Overrides for window, target and socket
 * @returns Replies keyed by `host:port`, possibly empty
 *
 * @example
 * const result = await discover({ timeoutMs: 2000 });
 * if (result.isOk()) {
 *   for (const [address, data] of result.value) { ... }
 * }
 */
export function discover(
  options: DiscoveryOptions = {},
): Promise<Result<DiscoveryResult, DiscoveryError>> {
  const operation = "discover";
  const defaults = getDiscoveryConfig();
  const timeoutMs = clampWindow(options.timeoutMs ?? defaults.timeoutMs);
  const broadcast: BroadcastConfig = {
    port: options.port ?? defaults.port,
    broadcastAddress: options.broadcastAddress ?? defaults.broadcastAddress,
    framing: options.framing ?? defaults.framing,
  };
  const startTime = Date.now();

  logOperationStart(log, operation, { timeoutMs, ...broadcast });

  const opened = openSocket(options.createSocket ?? createUdpSocket);
  if (opened.isErr()) {
    return Promise.resolve(err(opened.error));
  }
  const socket = opened.value;

  return new Promise((resolve) => {
    let devices: DiscoveryResult = new Map();
    let settled = false;

    const timer = setTimeout(() => finish(ok(devices)), timeoutMs);

    function finish(result: Result<DiscoveryResult, DiscoveryError>): void {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      socket.close();

      if (result.isOk()) {
        logOperationComplete(log, operation, startTime, {
          devices: result.value.size,
        });
      } else {
        logOperationFailed(log, operation, result.error.message);
      }

      resolve(result);
    }

    socket.onError((error) => {
      finish(err(socketError(error.message, error)));
    });

    socket.onMessage((message, remote) => {
      if (settled) {
        return;
      }

      const from = `${remote.address}:${remote.port}`;
      const reply = parseReply(message, defaults.maxFrameBytes);
      if (reply.isErr()) {
        log.warn(
          { from, error: formatCommandError(reply.error) },
          "Dropping malformed discovery reply",
        );
        return;
      }

      devices = recordReply(devices, {
        address: { host: remote.address, port: remote.port },
        payload: reply.value,
        receivedAt: Date.now(),
      });
      log.debug({ from }, "Discovery reply received");
    });

    socket.bind(() => {
      sendBroadcastProbe(socket, sysInfoCommand(), broadcast).then(
        (sent) => {
          if (sent.isErr()) {
            finish(err(socketError(formatTransportError(sent.error))));
          }
        },
        (error: unknown) => {
          const cause =
            error instanceof Error ? error : new Error(String(error));
          finish(err(socketError(cause.message, cause)));
        },
      );
    });
  });
}

function openSocket(
  create: () => DatagramSocket,
): Result<DatagramSocket, DiscoveryError> {
  try {
    return ok(create());
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return err(socketError(`Cannot open UDP socket: ${cause.message}`, cause));
  }
}
