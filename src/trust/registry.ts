/**
 * Trust & key registry: the single owner of device trust, key epochs and
 * replay protection.
 *
 * Every mutation is recorded on the evidence chain. A security-relevant
 * mutation (revocation, epoch advance) is applied before it is logged and
 * is never rolled back if logging fails: the append error propagates, and
 * the registry stays in the stricter state.
 */

import type { EvidenceChain } from "../audit/store.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import {
  TrustEpochManager,
  INITIAL_EPOCH,
  type EpochChange,
  type TrustEpoch,
} from "./epoch.js";
import {
  DeviceRegistry,
  type DeviceTrustRecord,
  type DeviceTrustState,
} from "./devices.js";
import type { NonceStore } from "./nonce-store.js";

export interface TrustState {
  epoch: TrustEpoch;
  devices: DeviceTrustRecord[];
}

export interface TrustRegistryDeps {
  nonces: NonceStore;
  currentDevice?: string;
  state?: TrustState;
  evidence?: EvidenceChain;
  logger?: Logger;
  clock?: () => Date;
}

export interface TrustIntegrity {
  epochValid: boolean;
  deviceRegistryValid: boolean;
  currentDeviceTrusted: boolean;
}

export type TrustChangeListener = (state: TrustState) => void;

const TRUST_SUBJECT = "trust-registry";

export class TrustRegistry {
  private readonly epochs: TrustEpochManager;
  private readonly devices: DeviceRegistry;
  private readonly nonces: NonceStore;
  private readonly evidence: EvidenceChain | undefined;
  private readonly logger: Logger;
  private readonly listeners = new Set<TrustChangeListener>();

  constructor(deps: TrustRegistryDeps) {
    const clock = deps.clock ?? (() => new Date());
    this.epochs = new TrustEpochManager(deps.state?.epoch ?? INITIAL_EPOCH);
    this.devices = new DeviceRegistry(
      deps.currentDevice,
      deps.state?.devices ?? [],
      clock,
    );
    this.nonces = deps.nonces;
    this.evidence = deps.evidence;
    this.logger = deps.logger ?? silentLogger();
  }

  // -----------------------------------------------------------------------
  // Epochs and keys
  // -----------------------------------------------------------------------

  currentEpoch(): TrustEpoch {
    return this.epochs.currentEpoch();
  }

  /** Checked on every verification; never served from a cached epoch. */
  isRevoked(keyVersion: number): boolean {
    return this.epochs.isRevoked(keyVersion);
  }

  revoke(keyVersion: number, reason = "manual revocation"): TrustEpoch {
    const change = this.epochs.revoke(keyVersion, reason);
    if (change) this.recordEpochChange(change);
    return this.currentEpoch();
  }

  rotateKey(reason: string): TrustEpoch {
    this.recordEpochChange(this.epochs.rotateKey(reason));
    return this.currentEpoch();
  }

  advanceEpoch(reason: string): TrustEpoch {
    this.recordEpochChange(this.epochs.advanceEpoch(reason));
    return this.currentEpoch();
  }

  validateTokenBinding(keyVersion: number, epochId: number): boolean {
    return this.epochs.validateTokenBinding(keyVersion, epochId);
  }

  // -----------------------------------------------------------------------
  // Devices
  // -----------------------------------------------------------------------

  registerDevice(fingerprint: string, displayName?: string): DeviceTrustRecord {
    const { record, created } = this.devices.register(fingerprint, displayName);
    if (created) {
      this.evidence?.append("device_registered", fingerprint, {
        displayName: record.displayName,
        trustState: record.trustState,
      });
      this.logger.info({ fingerprint }, "device registered");
      this.notify();
    }
    return record;
  }

  setTrustState(fingerprint: string, state: DeviceTrustState): DeviceTrustRecord {
    const transition = this.devices.setTrustState(fingerprint, state);
    if (!transition.changed) return transition.after;

    this.evidence?.append("device_trust_changed", fingerprint, {
      from: transition.before.trustState,
      to: transition.after.trustState,
    });

    if (state === "revoked") {
      this.logger.warn({ fingerprint }, "device revoked; advancing trust epoch");
      this.evidence?.append("trust_violation", fingerprint, {
        violation: "device_revoked",
      });
      this.recordEpochChange(
        this.epochs.advanceEpoch(`device revoked: ${fingerprint}`),
      );
    } else {
      this.notify();
    }
    return transition.after;
  }

  suspendDevice(fingerprint: string): DeviceTrustRecord {
    return this.setTrustState(fingerprint, "suspended");
  }

  reinstateDevice(fingerprint: string): DeviceTrustRecord {
    return this.setTrustState(fingerprint, "trusted");
  }

  revokeDevice(fingerprint: string): DeviceTrustRecord {
    return this.setTrustState(fingerprint, "revoked");
  }

  getDevice(fingerprint: string): DeviceTrustRecord | undefined {
    return this.devices.get(fingerprint);
  }

  listDevices(): DeviceTrustRecord[] {
    return this.devices.list();
  }

  get currentDevice(): string | undefined {
    return this.devices.current;
  }

  isDeviceTrusted(fingerprint: string): boolean {
    return this.devices.isTrusted(fingerprint);
  }

  isCurrentDeviceTrusted(): boolean {
    return this.devices.isCurrentDeviceTrusted();
  }

  // -----------------------------------------------------------------------
  // Replay protection
  // -----------------------------------------------------------------------

  consume(nonceId: string, expiresAt: Date): boolean {
    const ok = this.nonces.consume(nonceId, expiresAt);
    if (!ok) {
      this.logger.warn({ nonceId }, "nonce rejected (replayed or expired)");
    }
    return ok;
  }

  // -----------------------------------------------------------------------
  // Integrity and state
  // -----------------------------------------------------------------------

  verifyIntegrity(): TrustIntegrity {
    return {
      epochValid: this.epochs.verifyIntegrity(),
      deviceRegistryValid: this.devices.size > 0,
      currentDeviceTrusted: this.devices.isCurrentDeviceTrusted(),
    };
  }

  snapshot(): TrustState {
    return { epoch: this.currentEpoch(), devices: this.devices.list() };
  }

  onChange(listener: TrustChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private recordEpochChange(change: EpochChange): void {
    this.logger.info(
      {
        kind: change.kind,
        reason: change.reason,
        epoch: change.after.epochId,
        keyVersion: change.after.activeKeyVersion,
      },
      "trust epoch changed",
    );
    this.evidence?.append(change.kind, TRUST_SUBJECT, {
      reason: change.reason,
      fromEpoch: change.before.epochId,
      toEpoch: change.after.epochId,
      fromKeyVersion: change.before.activeKeyVersion,
      toKeyVersion: change.after.activeKeyVersion,
      revokedKeyVersions: [...change.after.revokedKeyVersions],
    });
    this.notify();
  }

  private notify(): void {
    const state = this.snapshot();
    for (const listener of this.listeners) {
      listener(state);
    }
  }
}
