import { createHash, timingSafeEqual } from "node:crypto";
import type { Authenticator } from "../interfaces/policy.js";

export interface CredentialAuthenticatorOptions {
  /** username → password. */
  credentials?: Record<string, string>;
  /** Accept every CONNECT regardless of credentials. */
  allowAnonymous?: boolean;
}

function digest(value: string | Uint8Array): Buffer {
  return createHash("sha256").update(value).digest();
}

/**
 * Authenticator backed by a static username/password table.
 *
 * Passwords are compared as SHA-256 digests with `timingSafeEqual`, so the
 * comparison time does not depend on where the inputs differ.
 */
export class CredentialAuthenticator implements Authenticator {
  private readonly hashes = new Map<string, Buffer>();
  private readonly allowAnonymous: boolean;

  constructor(options: CredentialAuthenticatorOptions = {}) {
    for (const [username, password] of Object.entries(options.credentials ?? {})) {
      this.hashes.set(username, digest(password));
    }
    this.allowAnonymous = options.allowAnonymous ?? false;
  }

  authenticate(username: string, password: Uint8Array | undefined): boolean {
    if (this.allowAnonymous) return true;

    const expected = this.hashes.get(username);
    if (!expected || !password) return false;
    return timingSafeEqual(digest(password), expected);
  }
}
