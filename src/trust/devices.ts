/**
 * Trusted device registry.
 *
 * Transitions:
 *   (new)      → trusted
 *   trusted    → suspended | revoked
 *   suspended  → trusted (reinstate) | revoked
 *   revoked    → (terminal; a new fingerprint must be registered)
 */

import { TrustRegistryError } from "./errors.js";

export type DeviceTrustState = "trusted" | "suspended" | "revoked";

export const DEVICE_TRUST_STATES: readonly DeviceTrustState[] = [
  "trusted",
  "suspended",
  "revoked",
];

export interface DeviceTrustRecord {
  readonly fingerprint: string;
  readonly displayName: string;
  readonly trustState: DeviceTrustState;
  readonly registeredAt: string;
  readonly updatedAt: string;
}

export interface DeviceTransition {
  before: DeviceTrustRecord;
  after: DeviceTrustRecord;
  changed: boolean;
}

const ALLOWED: Readonly<Record<DeviceTrustState, readonly DeviceTrustState[]>> = {
  trusted: ["suspended", "revoked"],
  suspended: ["trusted", "revoked"],
  revoked: [],
};

export class DeviceRegistry {
  private readonly records = new Map<string, DeviceTrustRecord>();
  private readonly currentFingerprint: string | undefined;
  private readonly clock: () => Date;

  constructor(
    currentFingerprint: string | undefined,
    records: Iterable<DeviceTrustRecord> = [],
    clock: () => Date = () => new Date(),
  ) {
    this.currentFingerprint = currentFingerprint;
    this.clock = clock;
    for (const r of records) {
      this.records.set(r.fingerprint, Object.freeze({ ...r }));
    }
  }

  get current(): string | undefined {
    return this.currentFingerprint;
  }

  /**
   * Register a device. Idempotent: an existing fingerprint returns its
   * record unchanged (a revoked fingerprint stays revoked).
   */
  register(
    fingerprint: string,
    displayName?: string,
  ): { record: DeviceTrustRecord; created: boolean } {
    if (fingerprint.trim().length === 0) {
      throw new TrustRegistryError(
        "Device fingerprint must be non-empty",
        "DEVICE_NOT_FOUND",
        { fingerprint },
      );
    }
    const existing = this.records.get(fingerprint);
    if (existing) return { record: existing, created: false };

    const now = this.clock().toISOString();
    const record: DeviceTrustRecord = Object.freeze({
      fingerprint,
      displayName: displayName ?? fingerprint.slice(0, 12),
      trustState: "trusted",
      registeredAt: now,
      updatedAt: now,
    });
    this.records.set(fingerprint, record);
    return { record, created: true };
  }

  get(fingerprint: string): DeviceTrustRecord | undefined {
    return this.records.get(fingerprint);
  }

  list(): DeviceTrustRecord[] {
    return [...this.records.values()].sort((a, b) =>
      a.registeredAt === b.registeredAt
        ? a.fingerprint.localeCompare(b.fingerprint)
        : a.registeredAt.localeCompare(b.registeredAt),
    );
  }

  /** Move a device to `state`. Setting the current state again is a no-op. */
  setTrustState(
    fingerprint: string,
    state: DeviceTrustState,
  ): DeviceTransition {
    const before = this.records.get(fingerprint);
    if (!before) {
      throw new TrustRegistryError(
        `Device not registered: ${fingerprint}`,
        "DEVICE_NOT_FOUND",
        { fingerprint },
      );
    }
    if (before.trustState === state) {
      return { before, after: before, changed: false };
    }

    if (!ALLOWED[before.trustState].includes(state)) {
      throw new TrustRegistryError(
        `Illegal device transition ${before.trustState} → ${state}`,
        "INVALID_TRANSITION",
        { fingerprint, from: before.trustState, to: state },
      );
    }

    const after: DeviceTrustRecord = Object.freeze({
      ...before,
      trustState: state,
      updatedAt: this.clock().toISOString(),
    });
    this.records.set(fingerprint, after);
    return { before, after, changed: true };
  }

  isTrusted(fingerprint: string): boolean {
    return this.records.get(fingerprint)?.trustState === "trusted";
  }

  isCurrentDeviceTrusted(): boolean {
    return (
      this.currentFingerprint !== undefined &&
      this.isTrusted(this.currentFingerprint)
    );
  }

  get size(): number {
    return this.records.size;
  }
}
