/**
 * Protocol Module - Error Types
 *
 * Typed error unions for payloads that decode but do not make sense.
 * Errors are values, not exceptions.
 */

/**
 * Errors raised while interpreting a decoded response.
 */
export type ProtocolError =
  | {
      readonly type: "INVALID_JSON";
      readonly message: string;
      readonly payload: string;
    }
  | {
      readonly type: "SCHEMA_MISMATCH";
      readonly message: string;
      /** Dotted path of the offending field, e.g. "system.get_sysinfo.alias" */
      readonly path: string;
    }
  | {
      readonly type: "DEVICE_ERROR";
      readonly message: string;
      readonly errCode: number;
    };

/**
 * Create an INVALID_JSON error.
 */
export function invalidJson(message: string, payload: string): ProtocolError {
  return { type: "INVALID_JSON", message, payload };
}

/**
 * Create a SCHEMA_MISMATCH error.
 */
export function schemaMismatch(message: string, path: string): ProtocolError {
  return { type: "SCHEMA_MISMATCH", message, path };
}

/**
 * Create a DEVICE_ERROR from a non-zero `err_code`.
 */
export function deviceError(message: string, errCode: number): ProtocolError {
  return { type: "DEVICE_ERROR", message, errCode };
}

/**
 * Format a ProtocolError for logging/display.
 */
export function formatProtocolError(error: ProtocolError): string {
  switch (error.type) {
    case "INVALID_JSON":
      return `Invalid JSON: ${error.message}`;
    case "SCHEMA_MISMATCH":
      return `Unexpected response at ${error.path}: ${error.message}`;
    case "DEVICE_ERROR":
      return `Device error ${error.errCode}: ${error.message}`;
  }
}
