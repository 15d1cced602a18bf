/**
 * Holder of the single active operator policy.
 *
 * The policy file is YAML so operators can edit it by hand. Every load and
 * update is validated with OperatorPolicySchema; an invalid file is an
 * error and never falls back to a permissive default.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import yaml from "yaml";
import type { EvidenceChain } from "../audit/store.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import {
  DEFAULT_POLICY,
  OperatorPolicySchema,
  computePolicyHash,
  type OperatorPolicy,
} from "./policy.js";

export type PolicyFileErrorCode = "POLICY_FILE_UNREADABLE" | "POLICY_FILE_INVALID";

export class PolicyFileError extends Error {
  public readonly code: PolicyFileErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: PolicyFileErrorCode,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "PolicyFileError";
    this.code = code;
    this.details = details ?? {};
  }
}

export type PolicyChangeListener = (policy: OperatorPolicy, policyHash: string) => void;

export interface PolicyStoreOptions {
  /** YAML file backing the policy. Omit for an in-memory store. */
  path?: string;
  initial?: OperatorPolicy;
  evidence?: EvidenceChain;
  logger?: Logger;
}

export function parsePolicy(input: unknown, source = "input"): OperatorPolicy {
  const result = OperatorPolicySchema.safeParse(input);
  if (!result.success) {
    throw new PolicyFileError(
      `Operator policy from ${source} failed validation`,
      "POLICY_FILE_INVALID",
      { source, issues: result.error.issues },
    );
  }
  return result.data;
}

export function loadPolicyFile(path: string): OperatorPolicy {
  let doc: unknown;
  try {
    doc = yaml.parse(readFileSync(path, "utf8"));
  } catch (err: unknown) {
    throw new PolicyFileError(
      `Cannot read policy file: ${path}`,
      "POLICY_FILE_UNREADABLE",
      { path, error: err instanceof Error ? err.message : String(err) },
    );
  }
  return parsePolicy(doc, path);
}

function clonePolicy(policy: OperatorPolicy): OperatorPolicy {
  return {
    ...policy,
    capabilities: { ...policy.capabilities },
  };
}

export class PolicyStore {
  private policy: Readonly<OperatorPolicy>;
  private readonly path: string | undefined;
  private readonly evidence: EvidenceChain | undefined;
  private readonly logger: Logger;
  private readonly listeners = new Set<PolicyChangeListener>();

  constructor(options: PolicyStoreOptions = {}) {
    this.path = options.path;
    this.evidence = options.evidence;
    this.logger = options.logger ?? silentLogger();

    if (options.initial) {
      this.policy = Object.freeze(clonePolicy(parsePolicy(options.initial)));
    } else if (this.path && existsSync(this.path)) {
      this.policy = Object.freeze(loadPolicyFile(this.path));
    } else {
      this.policy = Object.freeze(clonePolicy(DEFAULT_POLICY));
    }
  }

  /** Frozen snapshot; readers never see a half-applied update. */
  get(): Readonly<OperatorPolicy> {
    return this.policy;
  }

  hash(): string {
    return computePolicyHash(this.policy);
  }

  update(next: unknown): Readonly<OperatorPolicy> {
    const parsed = Object.freeze(clonePolicy(parsePolicy(next)));
    const previousHash = this.hash();
    this.policy = parsed;
    const policyHash = this.hash();

    if (this.path) this.save();
    this.evidence?.append("policy_updated", "operator-policy", {
      previousHash,
      policyHash,
      enabled: parsed.enabled,
    });
    this.logger.info({ policyHash }, "operator policy updated");

    for (const listener of this.listeners) {
      listener(parsed, policyHash);
    }
    return parsed;
  }

  save(): void {
    if (!this.path) return;
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, yaml.stringify(this.policy), "utf8");
  }

  onChange(listener: PolicyChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
