/**
 * Codec Module - Pure Transformations
 *
 * Autokey XOR obfuscation used on every TCP and UDP exchange.
 * Each cipher byte becomes the key for the next byte. The running key is a
 * local value, reseeded on every call, so no state leaks between frames.
 *
 * This is obfuscation, not encryption.
 */
import { INITIAL_KEY } from "./schema.js";

/**
 * Obfuscate plaintext bytes.
 *
 * @example
 * encrypt(Buffer.from("{"))
 * // <Buffer d0>  (0x7b ^ 0xab)
 */
export function encrypt(plaintext: Uint8Array): Buffer {
  const out = Buffer.alloc(plaintext.length);
  let key = INITIAL_KEY;

  plaintext.forEach((byte, index) => {
    key = byte ^ key;
    out[index] = key;
  });

  return out;
}

/**
 * Recover plaintext bytes from cipher text produced by {@link encrypt}.
 */
export function decrypt(ciphertext: Uint8Array): Buffer {
  const out = Buffer.alloc(ciphertext.length);
  let key = INITIAL_KEY;

  ciphertext.forEach((byte, index) => {
    out[index] = byte ^ key;
    key = byte;
  });

  return out;
}
