/**
 * Discovery Module - Error Types
 *
 * Discovery only fails when its own socket fails. Bad replies from
 * individual peers are dropped, not reported.
 */

export type DiscoveryError = {
  readonly type: "SOCKET_ERROR";
  readonly message: string;
  readonly cause?: Error;
};

/**
 * Create a SOCKET_ERROR.
 */
export function socketError(message: string, cause?: Error): DiscoveryError {
  if (cause) {
    return { type: "SOCKET_ERROR", message, cause };
  }
  return { type: "SOCKET_ERROR", message };
}

/**
 * Format a DiscoveryError for logging/display.
 */
export function formatDiscoveryError(error: DiscoveryError): string {
  return `Discovery failed: ${error.message}`;
}
