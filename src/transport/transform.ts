/**
 * Transport Module - Pure Transformations
 *
 * Frame encoding/decoding and address helpers.
 * No side effects, no I/O - just bytes in, bytes out.
 */
import { type Result, err, ok } from "neverthrow";

import { decrypt, encrypt } from "../codec/index.js";
import type { Command } from "../protocol/schema.js";
import { type TransportError, framingError } from "./errors.js";
import {
  type DatagramFraming,
  type DeviceAddress,
  FRAME_HEADER_BYTES,
} from "./schema.js";

// =============================================================================
// Serialization
// =============================================================================

/**
 * Serialize a command to UTF-8 JSON bytes.
 */
export function serializeCommand(command: Command): Buffer {
  return Buffer.from(JSON.stringify(command), "utf8");
}

// =============================================================================
// Frames
// =============================================================================

/**
 * Obfuscate a payload and prepend its big-endian length.
 *
 * @example
 * encodeFrame(Buffer.from("{}"))
 * // <Buffer 00 00 00 02 d0 ad>
 */
export function encodeFrame(plaintext: Uint8Array): Buffer {
  const body = encrypt(plaintext);
  const header = Buffer.alloc(FRAME_HEADER_BYTES);
  header.writeUInt32BE(body.length, 0);
  return Buffer.concat([header, body]);
}

/**
 * Read the declared body length from a frame header.
 *
 * @param header - At least the first 4 bytes of a frame
 * @param maxFrameBytes - Largest body length accepted
 */
export function readFrameLength(
  header: Buffer,
  maxFrameBytes: number,
): Result<number, TransportError> {
  if (header.length < FRAME_HEADER_BYTES) {
    return err(
      framingError(
        `Frame header needs ${FRAME_HEADER_BYTES} bytes, got ${header.length}`,
        { receivedLength: header.length },
      ),
    );
  }

  const declaredLength = header.readUInt32BE(0);
  if (declaredLength > maxFrameBytes) {
    return err(
      framingError(
        `Declared frame length ${declaredLength} exceeds limit of ${maxFrameBytes} bytes`,
        { declaredLength },
      ),
    );
  }

  return ok(declaredLength);
}

/**
 * Validate a complete frame and return its decoded body.
 *
 * The declared length must match the body length exactly: a short body
 * is truncated, a longer one carries trailing garbage.
 */
export function decodeFrame(
  frame: Buffer,
  maxFrameBytes: number,
): Result<Buffer, TransportError> {
  return readFrameLength(frame, maxFrameBytes).andThen((declaredLength) => {
    const receivedLength = frame.length - FRAME_HEADER_BYTES;

    if (receivedLength !== declaredLength) {
      return err(
        framingError(
          `Frame declares ${declaredLength} bytes but carries ${receivedLength}`,
          { declaredLength, receivedLength },
        ),
      );
    }

    return ok(decrypt(frame.subarray(FRAME_HEADER_BYTES)));
  });
}

// =============================================================================
// Datagrams
// =============================================================================

/**
 * Encode a UDP payload, with or without the length prefix.
 */
export function encodeDatagram(
  plaintext: Uint8Array,
  framing: DatagramFraming,
): Buffer {
  return framing === "framed" ? encodeFrame(plaintext) : encrypt(plaintext);
}

/**
 * Decode a UDP payload in either form.
 *
 * A datagram whose first four bytes equal the number of bytes that follow
 * is treated as framed; anything else is bare cipher text.
 */
export function decodeDatagram(
  message: Buffer,
  maxFrameBytes: number,
): Result<Buffer, TransportError> {
  if (
    message.length >= FRAME_HEADER_BYTES &&
    message.readUInt32BE(0) === message.length - FRAME_HEADER_BYTES
  ) {
    return decodeFrame(message, maxFrameBytes);
  }

  if (message.length > maxFrameBytes) {
    return err(
      framingError(
        `Datagram of ${message.length} bytes exceeds limit of ${maxFrameBytes} bytes`,
        { receivedLength: message.length },
      ),
    );
  }

  return ok(decrypt(message));
}

// =============================================================================
// Addresses
// =============================================================================

/**
 * Format an address as `host:port`.
 */
export function formatAddress(address: DeviceAddress): string {
  return `${address.host}:${address.port}`;
}
