/**
 * Codec Module - Constants
 *
 * The autokey cipher has a single parameter: the seed of the running key.
 */

/**
 * Seed of the running key, applied at the start of every encode/decode.
 */
export const INITIAL_KEY = 0xab;
