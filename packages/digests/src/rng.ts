/**
 * Secure random source port.
 *
 * `generate` consumes randomness through this interface; it never produces
 * it. Implementations must be cryptographically secure. Thread-safety and
 * reseeding are the implementation's concern.
 */

import { randomFillSync } from "node:crypto";

export interface SecureRng {
  /** Fill `dest` entirely with random bytes. */
  fillBytes(dest: Uint8Array): void;
}

/**
 * Process default generator backed by the OS CSPRNG.
 */
export const defaultRng: SecureRng = {
  fillBytes(dest: Uint8Array): void {
    randomFillSync(dest);
  },
};
