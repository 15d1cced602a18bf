/**
 * Trust epochs and signing-key versions.
 *
 * INVARIANTS:
 *   - epochId and activeKeyVersion only ever increase.
 *   - revokedKeyVersions is append-only; a revoked version stays revoked.
 *   - The active version is never a revoked one: revoking it rotates.
 */

import { TrustRegistryError } from "./errors.js";

export interface TrustEpoch {
  readonly epochId: number;
  readonly activeKeyVersion: number;
  readonly revokedKeyVersions: readonly number[];
}

export interface EpochChange {
  kind: "key_rotated" | "key_revoked" | "epoch_advanced";
  reason: string;
  before: TrustEpoch;
  after: TrustEpoch;
}

export const INITIAL_EPOCH: TrustEpoch = Object.freeze({
  epochId: 1,
  activeKeyVersion: 1,
  revokedKeyVersions: Object.freeze([]),
});

function freezeEpoch(
  epochId: number,
  activeKeyVersion: number,
  revoked: Iterable<number>,
): TrustEpoch {
  return Object.freeze({
    epochId,
    activeKeyVersion,
    revokedKeyVersions: Object.freeze([...revoked].sort((a, b) => a - b)),
  });
}

export class TrustEpochManager {
  private epochId: number;
  private activeKeyVersion: number;
  private readonly revoked: Set<number>;
  private snapshotCache: TrustEpoch;

  constructor(initial: TrustEpoch = INITIAL_EPOCH) {
    if (
      !Number.isInteger(initial.epochId) ||
      initial.epochId < 1 ||
      !Number.isInteger(initial.activeKeyVersion) ||
      initial.activeKeyVersion < 1
    ) {
      throw new TrustRegistryError(
        "Trust epoch and key version must be positive integers",
        "INVALID_KEY_VERSION",
        { ...initial },
      );
    }
    this.epochId = initial.epochId;
    this.activeKeyVersion = initial.activeKeyVersion;
    this.revoked = new Set(initial.revokedKeyVersions);
    if (this.revoked.has(this.activeKeyVersion)) {
      // Loaded state whose active key was revoked elsewhere: rotate past it.
      this.activeKeyVersion = Math.max(...this.revoked) + 1;
      this.epochId += 1;
    }
    this.snapshotCache = this.freeze();
  }

  /** Immutable snapshot; safe to hand to lock-free readers. */
  currentEpoch(): TrustEpoch {
    return this.snapshotCache;
  }

  isRevoked(keyVersion: number): boolean {
    return this.revoked.has(keyVersion);
  }

  /**
   * Revoke a key version. Revoking the active version also activates a new
   * one and advances the epoch. Revoking an already-revoked version is a
   * no-op that returns `undefined`.
   */
  revoke(keyVersion: number, reason = "manual revocation"): EpochChange | undefined {
    if (
      !Number.isInteger(keyVersion) ||
      keyVersion < 1 ||
      keyVersion > this.activeKeyVersion
    ) {
      throw new TrustRegistryError(
        `Unknown key version: ${keyVersion}`,
        "INVALID_KEY_VERSION",
        { keyVersion, activeKeyVersion: this.activeKeyVersion },
      );
    }
    if (this.revoked.has(keyVersion)) return undefined;

    if (keyVersion === this.activeKeyVersion) {
      return this.rotateKey(reason);
    }

    const before = this.snapshotCache;
    this.revoked.add(keyVersion);
    this.snapshotCache = this.freeze();
    return { kind: "key_revoked", reason, before, after: this.snapshotCache };
  }

  /** Revoke the active version, activate the next one, advance the epoch. */
  rotateKey(reason: string): EpochChange {
    const before = this.snapshotCache;
    this.revoked.add(this.activeKeyVersion);
    this.activeKeyVersion = Math.max(this.activeKeyVersion, ...this.revoked) + 1;
    this.epochId += 1;
    this.snapshotCache = this.freeze();
    return { kind: "key_rotated", reason, before, after: this.snapshotCache };
  }

  /** Security events (device revocation, mirror divergence) bump the epoch. */
  advanceEpoch(reason: string): EpochChange {
    const before = this.snapshotCache;
    this.epochId += 1;
    this.snapshotCache = this.freeze();
    return { kind: "epoch_advanced", reason, before, after: this.snapshotCache };
  }

  /**
   * A token is bound to the epoch it was issued in. Any rotation or epoch
   * advance since issuance invalidates it.
   */
  validateTokenBinding(keyVersion: number, epochId: number): boolean {
    return (
      !this.revoked.has(keyVersion) &&
      keyVersion === this.activeKeyVersion &&
      epochId === this.epochId
    );
  }

  verifyIntegrity(): boolean {
    return (
      this.epochId >= 1 &&
      this.activeKeyVersion >= 1 &&
      !this.revoked.has(this.activeKeyVersion)
    );
  }

  private freeze(): TrustEpoch {
    return freezeEpoch(this.epochId, this.activeKeyVersion, this.revoked);
  }
}
