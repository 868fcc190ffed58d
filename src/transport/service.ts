/**
 * Transport Module - Service Layer
 *
 * Side effects happen here: TCP round trips and UDP broadcasts.
 * Every call owns its socket and closes it before resolving.
 * Uses Result types for explicit error handling.
 */
import { createSocket } from "node:dgram";
import { type Socket, connect } from "node:net";
import { type Result, err, ok } from "neverthrow";

import { getTransportConfig } from "../config.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import type { Command } from "../protocol/schema.js";
import {
  type TransportError,
  formatTransportError,
  framingError,
  networkError,
  timeout,
} from "./errors.js";
import {
  type BroadcastConfig,
  type DatagramSocket,
  type DeviceAddress,
  FRAME_HEADER_BYTES,
  type TcpTransportConfig,
  type Transport,
} from "./schema.js";
import {
  decodeFrame,
  encodeDatagram,
  encodeFrame,
  formatAddress,
  readFrameLength,
  serializeCommand,
} from "./transform.js";

const log = createLogger("transport");

// =============================================================================
// TCP
// =============================================================================

/**
 * Create a transport that sends each command over a fresh TCP connection.
 *
 * @param config - Timeout and frame bound; defaults come from the environment
 */
export function createTcpTransport(
  config: TcpTransportConfig = getTransportConfig(),
): Transport {
  return {
    sendAndReceive: (address, command) =>
      exchangeFrame(address, serializeCommand(command), config),
  };
}

/**
 * Write one frame to a device and read one frame back.
 *
 * Resolves with the decoded response body once exactly the declared number
 * of bytes has arrived. Bytes past the declared length are ignored.
 */
export function exchangeFrame(
  address: DeviceAddress,
  plaintext: Buffer,
  config: TcpTransportConfig,
): Promise<Result<Buffer, TransportError>> {
  const operation = "exchangeFrame";
  const target = formatAddress(address);
  const startTime = Date.now();

  logOperationStart(log, operation, {
    address: target,
    requestBytes: plaintext.length,
  });

  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    let receivedBytes = 0;
    let declaredLength: number | null = null;
    let settled = false;

    let socket: Socket;
    try {
      socket = connect({ host: address.host, port: address.port });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      const failure = networkError(
        `Cannot connect to ${target}: ${cause.message}`,
        cause,
      );
      logOperationFailed(log, operation, formatTransportError(failure), {
        address: target,
      });
      resolve(err(failure));
      return;
    }
    socket.setTimeout(config.timeoutMs);

    const finish = (result: Result<Buffer, TransportError>): void => {
      if (settled) {
        return;
      }
      settled = true;
      socket.destroy();

      if (result.isOk()) {
        logOperationComplete(log, operation, startTime, {
          address: target,
          responseBytes: result.value.length,
        });
      } else {
        logOperationFailed(log, operation, formatTransportError(result.error), {
          address: target,
        });
      }

      resolve(result);
    };

    socket.on("connect", () => {
      socket.write(encodeFrame(plaintext));
    });

    socket.on("data", (chunk: Buffer) => {
      chunks.push(chunk);
      receivedBytes += chunk.length;

      if (declaredLength === null) {
        if (receivedBytes < FRAME_HEADER_BYTES) {
          return;
        }
        const length = readFrameLength(
          Buffer.concat(chunks),
          config.maxFrameBytes,
        );
        if (length.isErr()) {
          finish(err(length.error));
          return;
        }
        declaredLength = length.value;
      }

      const frameLength = FRAME_HEADER_BYTES + declaredLength;
      if (receivedBytes >= frameLength) {
        const frame = Buffer.concat(chunks).subarray(0, frameLength);
        finish(decodeFrame(frame, config.maxFrameBytes));
      }
    });

    socket.on("timeout", () => {
      finish(
        err(timeout(`No complete response from ${target}`, config.timeoutMs)),
      );
    });

    socket.on("error", (error: Error) => {
      finish(
        err(networkError(`Socket error on ${target}: ${error.message}`, error)),
      );
    });

    socket.on("close", () => {
      finish(
        err(
          framingError(
            `Connection to ${target} closed before a full frame arrived`,
            {
              declaredLength: declaredLength ?? undefined,
              receivedLength: receivedBytes,
            },
          ),
        ),
      );
    });
  });
}

// =============================================================================
// UDP
// =============================================================================

/**
 * Open an IPv4 UDP socket.
 */
export function createUdpSocket(): DatagramSocket {
  const socket = createSocket({ type: "udp4", reuseAddr: true });

  return {
    bind: (onListening) => {
      socket.bind(onListening);
    },
    setBroadcast: (flag) => {
      socket.setBroadcast(flag);
    },
    send: (message, port, address, onSent) => {
      socket.send(message, port, address, (error) => onSent(error));
    },
    onMessage: (listener) => {
      socket.on("message", (message, remote) =>
        listener(message, { address: remote.address, port: remote.port }),
      );
    },
    onError: (listener) => {
      socket.on("error", listener);
    },
    close: () => {
      socket.close();
    },
  };
}

/**
 * Broadcast one command datagram from an already bound socket.
 *
 * Resolves once the datagram is handed to the network; replies are left to
 * whoever listens on the socket.
 */
export function sendBroadcastProbe(
  socket: DatagramSocket,
  command: Command,
  config: BroadcastConfig,
): Promise<Result<true, TransportError>> {
  const message = encodeDatagram(serializeCommand(command), config.framing);
  const target = `${config.broadcastAddress}:${config.port}`;

  try {
    socket.setBroadcast(true);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return Promise.resolve(
      err(networkError(`Cannot enable broadcast: ${cause.message}`, cause)),
    );
  }

  log.debug({ target, bytes: message.length }, "Broadcasting probe");

  return new Promise((resolve) => {
    const failed = (error: Error): void => {
      resolve(
        err(
          networkError(`Broadcast to ${target} failed: ${error.message}`, error),
        ),
      );
    };

    try {
      socket.send(message, config.port, config.broadcastAddress, (error) => {
        if (error) {
          failed(error);
          return;
        }
        resolve(ok(true));
      });
    } catch (error) {
      failed(error instanceof Error ? error : new Error(String(error)));
    }
  });
}
