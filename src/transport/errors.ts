/**
 * Transport Module - Error Types
 *
 * Typed error unions for socket and framing failures.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while exchanging a frame with a device.
 */
export type TransportError =
  | {
      readonly type: "NETWORK_ERROR";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "TIMEOUT";
      readonly message: string;
      readonly timeoutMs: number;
    }
  | {
      readonly type: "FRAMING_ERROR";
      readonly message: string;
      readonly declaredLength?: number;
      readonly receivedLength?: number;
    };

/**
 * Create a NETWORK_ERROR.
 */
export function networkError(message: string, cause?: Error): TransportError {
  if (cause) {
    return { type: "NETWORK_ERROR", message, cause };
  }
  return { type: "NETWORK_ERROR", message };
}

/**
 * Create a TIMEOUT error.
 */
export function timeout(message: string, timeoutMs: number): TransportError {
  return { type: "TIMEOUT", message, timeoutMs };
}

/**
 * Create a FRAMING_ERROR.
 */
export function framingError(
  message: string,
  lengths: { declaredLength?: number; receivedLength?: number } = {},
): TransportError {
  return { type: "FRAMING_ERROR", message, ...lengths };
}

/**
 * Format a TransportError for logging/display.
 */
export function formatTransportError(error: TransportError): string {
  switch (error.type) {
    case "NETWORK_ERROR":
      return `Network error: ${error.message}`;
    case "TIMEOUT":
      return `Timeout after ${error.timeoutMs}ms: ${error.message}`;
    case "FRAMING_ERROR":
      return `Framing error: ${error.message}`;
  }
}
