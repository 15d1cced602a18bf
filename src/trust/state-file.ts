/**
 * Trust registry persistence: one canonical-JSON file.
 *
 * Reads are validated with zod; a malformed file is an error, never an
 * implicit reset to the initial epoch.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { canonicalJson } from "../audit/canonical.js";
import { TrustRegistryError } from "./errors.js";
import type { TrustState } from "./registry.js";

const ISO8601_RE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d{1,3})?Z$/;
const iso8601Utc = z
  .string()
  .regex(ISO8601_RE, "Must be ISO 8601 UTC datetime")
  .refine((s) => !isNaN(Date.parse(s)), "Must be parseable datetime");

const positiveInt = z.number().int().min(1);

export const TrustStateSchema = z.object({
  schemaVersion: z.literal("1.0.0"),
  epoch: z.object({
    epochId: positiveInt,
    activeKeyVersion: positiveInt,
    revokedKeyVersions: z.array(positiveInt),
  }),
  devices: z.array(
    z.object({
      fingerprint: z.string().min(1).max(256),
      displayName: z.string().max(200),
      trustState: z.enum(["trusted", "suspended", "revoked"]),
      registeredAt: iso8601Utc,
      updatedAt: iso8601Utc,
    }),
  ),
});

export function readTrustState(path: string): TrustState | undefined {
  if (!existsSync(path)) return undefined;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err: unknown) {
    throw new TrustRegistryError(
      `Trust state file is not valid JSON: ${path}`,
      "STATE_FILE_INVALID",
      { path, error: err instanceof Error ? err.message : String(err) },
    );
  }

  const result = TrustStateSchema.safeParse(raw);
  if (!result.success) {
    throw new TrustRegistryError(
      `Trust state file failed validation: ${path}`,
      "STATE_FILE_INVALID",
      { path, issues: result.error.issues },
    );
  }
  return { epoch: result.data.epoch, devices: result.data.devices };
}

/** Write-then-rename so a crash never leaves a half-written file. */
export function writeTrustState(path: string, state: TrustState): void {
  mkdirSync(dirname(path), { recursive: true });
  const tmp = `${path}.tmp`;
  writeFileSync(
    tmp,
    canonicalJson({
      schemaVersion: "1.0.0",
      epoch: {
        epochId: state.epoch.epochId,
        activeKeyVersion: state.epoch.activeKeyVersion,
        revokedKeyVersions: [...state.epoch.revokedKeyVersions],
      },
      devices: state.devices,
    }),
    "utf8",
  );
  renameSync(tmp, path);
}
