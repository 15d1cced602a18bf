/**
 * Evidence mirror: copies the local chain to an external target.
 *
 * The mirror may only ever be a prefix of the local chain. `sync` pushes
 * the missing tail when that holds, and only from a local chain that
 * verifies. A hash mismatch at a shared seq, or a mirror longer than local,
 * is recorded as a divergence; nothing is pushed or repaired and
 * reconciliation is a human action.
 */

import { appendFileSync, existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import { canonicalJson } from "./canonical.js";
import type { EvidenceChain, EvidenceEntry } from "./store.js";
import { GovernanceError } from "../kernel/errors.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";

// ---------------------------------------------------------------------------
// Targets
// ---------------------------------------------------------------------------

export interface MirrorTarget {
  readonly name: string;
  /** Every mirrored entry, in seq order. */
  read(): Promise<EvidenceEntry[]>;
  write(entries: readonly EvidenceEntry[]): Promise<void>;
}

export class MemoryMirrorTarget implements MirrorTarget {
  readonly name: string;
  protected entries: EvidenceEntry[] = [];

  constructor(name = "memory") {
    this.name = name;
  }

  async read(): Promise<EvidenceEntry[]> {
    return [...this.entries];
  }

  async write(entries: readonly EvidenceEntry[]): Promise<void> {
    this.entries.push(...entries);
  }
}

const MirroredEntrySchema = z.object({
  seq: z.number().int().min(1),
  id: z.string(),
  createdAt: z.string(),
  type: z.string(),
  subjectId: z.string(),
  payload: z.record(z.unknown()),
  payloadHash: z.string(),
  prevHash: z.string(),
  entryHash: z.string(),
});

/** JSONL file, one canonical entry per line. */
export class FileMirrorTarget implements MirrorTarget {
  readonly name: string;

  constructor(private readonly path: string) {
    this.name = `file:${path}`;
  }

  async read(): Promise<EvidenceEntry[]> {
    if (!existsSync(this.path)) return [];
    return readFileSync(this.path, "utf8")
      .split("\n")
      .filter((line) => line.trim().length > 0)
      .map((line, i) => {
        let json: unknown;
        try {
          json = JSON.parse(line);
        } catch {
          throw new GovernanceError(`Mirror line ${i + 1} is not valid JSON`, "MIRROR_DIVERGENCE", {
            target: this.name,
            line: i + 1,
          });
        }
        const parsed = MirroredEntrySchema.safeParse(json);
        if (!parsed.success) {
          throw new GovernanceError(`Mirror line ${i + 1} is malformed`, "MIRROR_DIVERGENCE", {
            target: this.name,
            line: i + 1,
          });
        }
        return parsed.data;
      });
  }

  async write(entries: readonly EvidenceEntry[]): Promise<void> {
    if (entries.length === 0) return;
    appendFileSync(this.path, entries.map((e) => canonicalJson(e) + "\n").join(""), "utf8");
  }
}

// ---------------------------------------------------------------------------
// Divergence
// ---------------------------------------------------------------------------

export type MirrorStatus = "in_sync" | "behind" | "diverged";

export interface DivergenceReport {
  target: string;
  status: MirrorStatus;
  localCount: number;
  remoteCount: number;
  /** First seq whose entry hash differs, or the first seq only the mirror has. */
  firstDivergentSeq: number | null;
  checkedAt: string;
}

export function compareChains(
  local: readonly EvidenceEntry[],
  remote: readonly EvidenceEntry[],
): Pick<DivergenceReport, "status" | "firstDivergentSeq"> {
  const shared = Math.min(local.length, remote.length);
  for (let i = 0; i < shared; i++) {
    if (local[i].seq !== remote[i].seq || local[i].entryHash !== remote[i].entryHash) {
      return { status: "diverged", firstDivergentSeq: local[i].seq };
    }
  }
  if (remote.length > local.length) {
    return { status: "diverged", firstDivergentSeq: remote[local.length].seq };
  }
  if (remote.length < local.length) {
    return { status: "behind", firstDivergentSeq: null };
  }
  return { status: "in_sync", firstDivergentSeq: null };
}

// ---------------------------------------------------------------------------
// Mirror
// ---------------------------------------------------------------------------

export class EvidenceMirror {
  private last: DivergenceReport | undefined;

  constructor(
    private readonly local: EvidenceChain,
    private readonly target: MirrorTarget,
    private readonly logger: Logger = silentLogger(),
    private readonly clock: () => Date = () => new Date(),
  ) {}

  get lastReport(): DivergenceReport | undefined {
    return this.last;
  }

  async compare(): Promise<DivergenceReport> {
    const local = this.local.listEntries();
    const remote = await this.target.read();
    const verdict = compareChains(local, remote);
    this.last = {
      target: this.target.name,
      localCount: local.length,
      remoteCount: remote.length,
      checkedAt: this.clock().toISOString(),
      ...verdict,
    };
    return this.last;
  }

  /** Push the missing tail. A diverged mirror is reported, never written. */
  async sync(): Promise<DivergenceReport> {
    const local = this.local.listEntries();
    const report = await this.compare();

    if (report.status === "diverged") {
      this.logger.warn(
        { target: report.target, firstDivergentSeq: report.firstDivergentSeq },
        "evidence mirror diverged",
      );
      this.local.append("mirror_divergence", this.target.name, {
        localCount: report.localCount,
        remoteCount: report.remoteCount,
        firstDivergentSeq: report.firstDivergentSeq,
      });
      return report;
    }

    if (report.status === "behind") {
      const integrity = this.local.verifyChainIntegrity();
      if (!integrity.overallValid) {
        throw new GovernanceError(
          `Local chain fails verification at index ${integrity.firstViolation}; not mirroring`,
          "CHAIN_INTEGRITY_VIOLATION",
          { firstViolation: integrity.firstViolation },
        );
      }
      await this.target.write(local.slice(report.remoteCount));
      this.logger.info(
        { target: report.target, pushed: report.localCount - report.remoteCount },
        "evidence mirror synced",
      );
      this.last = { ...report, status: "in_sync", remoteCount: report.localCount };
    }
    return this.last ?? report;
  }

  async assertInSync(): Promise<void> {
    const report = await this.compare();
    if (report.status === "diverged") {
      throw new GovernanceError(
        `Evidence mirror ${report.target} diverged at seq ${report.firstDivergentSeq}`,
        "MIRROR_DIVERGENCE",
        { ...report },
      );
    }
  }
}
