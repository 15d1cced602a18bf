/**
 * HMAC-SHA256 payload signing bound to the trust epoch.
 *
 * INVARIANTS:
 *   - New signatures use the epoch's active key version only.
 *   - Verification consults TrustRegistry.isRevoked on every call, so a
 *     revoked version never verifies, whatever epoch a caller last saw.
 *   - Key material lives in the CredentialStore as `signing-key-v<N>`.
 */

import { createHmac, randomBytes, timingSafeEqual } from "node:crypto";
import { canonicalJson } from "../audit/canonical.js";
import { GovernanceError } from "../kernel/errors.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import type { CredentialStore } from "./credential-store.js";
import type { TrustRegistry } from "./registry.js";

export interface SignedEnvelope<T extends Record<string, unknown>> {
  payload: T;
  keyVersion: number;
  epoch: number;
  signature: string;
}

export type VerifyOutcome =
  | { valid: true }
  | { valid: false; reason: "key_revoked" | "key_missing" | "signature_mismatch" };

const KEY_BYTES = 32;

export function signingKeyName(version: number): string {
  return `signing-key-v${version}`;
}

function mac(key: Buffer, body: string): string {
  return createHmac("sha256", key).update(body, "utf8").digest("base64");
}

function signingInput(
  payload: Record<string, unknown>,
  keyVersion: number,
  epoch: number,
): string {
  return canonicalJson({ epoch, keyVersion, payload });
}

export class PayloadSigner {
  private readonly trust: TrustRegistry;
  private readonly credentials: CredentialStore;
  private readonly logger: Logger;

  constructor(
    trust: TrustRegistry,
    credentials: CredentialStore,
    logger: Logger = silentLogger(),
  ) {
    this.trust = trust;
    this.credentials = credentials;
    this.logger = logger;
  }

  /** Provision key material for the active version if none exists yet. */
  async ensureActiveKey(): Promise<number> {
    const { activeKeyVersion } = this.trust.currentEpoch();
    const name = signingKeyName(activeKeyVersion);
    if (!(await this.credentials.retrieve(name))) {
      await this.credentials.store(name, randomBytes(KEY_BYTES));
      this.logger.info({ keyVersion: activeKeyVersion }, "signing key provisioned");
    }
    return activeKeyVersion;
  }

  async hasActiveKey(): Promise<boolean> {
    const { activeKeyVersion } = this.trust.currentEpoch();
    return (await this.credentials.retrieve(signingKeyName(activeKeyVersion))) !== undefined;
  }

  async sign<T extends Record<string, unknown>>(payload: T): Promise<SignedEnvelope<T>> {
    const { epochId, activeKeyVersion } = this.trust.currentEpoch();
    if (this.trust.isRevoked(activeKeyVersion)) {
      throw new GovernanceError(
        `Active key version ${activeKeyVersion} is revoked`,
        "KEY_REVOKED",
        { keyVersion: activeKeyVersion },
      );
    }
    await this.ensureActiveKey();
    const key = await this.credentials.retrieve(signingKeyName(activeKeyVersion));
    // The registry may have rotated while the key was being read.
    if (this.trust.isRevoked(activeKeyVersion)) {
      throw new GovernanceError(
        `Key version ${activeKeyVersion} was revoked during signing`,
        "KEY_REVOKED",
        { keyVersion: activeKeyVersion },
      );
    }
    if (!key) {
      throw new GovernanceError(
        `Signing key v${activeKeyVersion} unavailable`,
        "KEY_REVOKED",
        { keyVersion: activeKeyVersion, missing: true },
      );
    }
    return {
      payload,
      keyVersion: activeKeyVersion,
      epoch: epochId,
      signature: mac(key, signingInput(payload, activeKeyVersion, epochId)),
    };
  }

  async verify<T extends Record<string, unknown>>(
    envelope: SignedEnvelope<T>,
  ): Promise<VerifyOutcome> {
    if (this.trust.isRevoked(envelope.keyVersion)) {
      this.logger.warn(
        { keyVersion: envelope.keyVersion },
        "signature rejected: key version revoked",
      );
      return { valid: false, reason: "key_revoked" };
    }
    const key = await this.credentials.retrieve(signingKeyName(envelope.keyVersion));
    if (this.trust.isRevoked(envelope.keyVersion)) {
      return { valid: false, reason: "key_revoked" };
    }
    if (!key) return { valid: false, reason: "key_missing" };

    const expected = Buffer.from(
      mac(key, signingInput(envelope.payload, envelope.keyVersion, envelope.epoch)),
      "utf8",
    );
    const actual = Buffer.from(envelope.signature, "utf8");
    if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
      return { valid: false, reason: "signature_mismatch" };
    }
    return { valid: true };
  }
}
