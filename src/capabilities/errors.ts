/**
 * Capabilities Module - Error Types
 *
 * Validation errors for caller-supplied arguments, plus the union of
 * everything a capability call can fail with.
 */
import {
  type ProtocolError,
  formatProtocolError,
} from "../protocol/index.js";
import {
  type TransportError,
  formatTransportError,
} from "../transport/index.js";

/**
 * An argument rejected before any network I/O.
 */
export type ValidationError = {
  readonly type: "VALIDATION_ERROR";
  readonly message: string;
  readonly field: string;
  readonly value: unknown;
};

/**
 * Everything a capability call can fail with.
 */
export type CommandError = TransportError | ProtocolError | ValidationError;

/**
 * Create a VALIDATION_ERROR.
 */
export function validationError(
  message: string,
  field: string,
  value: unknown,
): ValidationError {
  return { type: "VALIDATION_ERROR", message, field, value };
}

/**
 * Format a CommandError for logging/display.
 */
export function formatCommandError(error: CommandError): string {
  switch (error.type) {
    case "VALIDATION_ERROR":
      return `Invalid ${error.field}: ${error.message}`;
    case "NETWORK_ERROR":
    case "TIMEOUT":
    case "FRAMING_ERROR":
      return formatTransportError(error);
    case "INVALID_JSON":
    case "SCHEMA_MISMATCH":
    case "DEVICE_ERROR":
      return formatProtocolError(error);
  }
}
