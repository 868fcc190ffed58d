/**
 * Codec Module - Public API
 */

export { INITIAL_KEY } from "./schema.js";
export { decrypt, encrypt } from "./transform.js";
