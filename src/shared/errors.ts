import type { ObfsRole } from "../pt/types.ts";

export class ContextAlreadyInitializedError extends Error {
  override name = "ContextAlreadyInitializedError";
  readonly address: string;

  constructor(address: string) {
    super(`obfuscation context already initialized for ${address}`);
    this.address = address;
  }
}

export class ContextNotInitializedError extends Error {
  override name = "ContextNotInitializedError";
  readonly address: string;

  constructor(address: string) {
    super(`obfuscation context not initialized for ${address}`);
    this.address = address;
  }
}

/**
 * Thrown when a client operation finds a server context under the address (or vice versa).
 */
export class ContextRoleMismatchError extends Error {
  override name = "ContextRoleMismatchError";
  readonly address: string;
  readonly expected: ObfsRole;
  readonly actual: ObfsRole;

  constructor(address: string, expected: ObfsRole, actual: ObfsRole) {
    super(
      `obfuscation context for ${address} is a ${actual} context, expected ${expected}`,
    );
    this.address = address;
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * The HTTP disguise exchange failed: the peer sent something that is not HTTP,
 * the stream ended early, or the server answered with a non-200 status.
 */
export class HandshakeError extends Error {
  override name = "HandshakeError";
}
