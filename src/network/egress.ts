/**
 * Network egress gate: the only path by which kernel components reach the
 * network.
 *
 * Rules, evaluated in order:
 *   1. offline mode denies everything.
 *   2. The URL must parse and use https, in every mode.
 *   3. dev mode stops here (any HTTPS host).
 *   4. allowlist mode: the connector must be registered, the host must be
 *      one of its hosts, the path must start with one of its prefixes and
 *      the method must be one it permits.
 *
 * Every denial is logged to the evidence chain as `network_violation` and
 * surfaces as GovernanceError("NETWORK_BLOCKED").
 */

import { existsSync, readFileSync } from "node:fs";
import yaml from "yaml";
import { z } from "zod";
import type { EvidenceChain } from "../audit/store.js";
import { GovernanceError } from "../kernel/errors.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const EGRESS_MODES = ["offline", "allowlist", "dev"] as const;
export type EgressMode = (typeof EGRESS_MODES)[number];

export function isEgressMode(value: string): value is EgressMode {
  return (EGRESS_MODES as readonly string[]).includes(value);
}

export const HTTP_METHODS = ["GET", "POST"] as const;
export type HttpMethod = (typeof HTTP_METHODS)[number];

export const ConnectorRuleSchema = z
  .object({
    hosts: z.array(z.string().min(1).toLowerCase()).min(1),
    pathPrefixes: z.array(z.string().startsWith("/")).min(1).default(["/"]),
    methods: z.array(z.enum(HTTP_METHODS)).min(1).default(["GET"]),
  })
  .strict();

export const EgressAllowlistSchema = z
  .object({
    connectors: z.record(z.string().min(1), ConnectorRuleSchema),
  })
  .strict();

export type ConnectorRule = z.infer<typeof ConnectorRuleSchema>;
export type EgressAllowlist = z.infer<typeof EgressAllowlistSchema>;

export type EgressAllowlistInput = z.input<typeof EgressAllowlistSchema>;

export const EMPTY_ALLOWLIST: EgressAllowlist = { connectors: {} };

// ---------------------------------------------------------------------------
// Allowlist file
// ---------------------------------------------------------------------------

export type EgressAllowlistErrorCode = "ALLOWLIST_UNREADABLE" | "ALLOWLIST_INVALID";

export class EgressAllowlistError extends Error {
  public readonly code: EgressAllowlistErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(message: string, code: EgressAllowlistErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = "EgressAllowlistError";
    this.code = code;
    this.details = details ?? {};
  }
}

/** A missing file is an empty allowlist; a malformed one is an error. */
export function loadEgressAllowlist(path: string): EgressAllowlist {
  if (!existsSync(path)) return EMPTY_ALLOWLIST;
  let doc: unknown;
  try {
    doc = yaml.parse(readFileSync(path, "utf8"));
  } catch (err: unknown) {
    throw new EgressAllowlistError(`Cannot read egress allowlist: ${path}`, "ALLOWLIST_UNREADABLE", {
      path,
      error: err instanceof Error ? err.message : String(err),
    });
  }
  const result = EgressAllowlistSchema.safeParse(doc ?? EMPTY_ALLOWLIST);
  if (!result.success) {
    throw new EgressAllowlistError(`Egress allowlist failed validation: ${path}`, "ALLOWLIST_INVALID", {
      path,
      issues: result.error.issues,
    });
  }
  return result.data;
}

export interface EgressRequest {
  connectorId: string;
  url: string;
  method?: HttpMethod;
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
}

export interface EgressResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export interface TransportRequest {
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

export type EgressTransport = (request: TransportRequest) => Promise<EgressResponse>;

export type EgressCheck =
  | { allowed: true; url: URL }
  | { allowed: false; reason: string };

export interface NetworkEgressGateDeps {
  mode: EgressMode;
  allowlist?: EgressAllowlistInput;
  transport?: EgressTransport;
  evidence?: EvidenceChain;
  logger?: Logger;
  defaultTimeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 15_000;

/** Transport over the global fetch. */
export const fetchTransport: EgressTransport = async (req) => {
  const res = await fetch(req.url, {
    method: req.method,
    headers: req.headers,
    body: req.body,
    signal: req.signal,
    redirect: "error",
  });
  const headers: Record<string, string> = {};
  res.headers.forEach((value, key) => {
    headers[key] = value;
  });
  return { status: res.status, headers, body: await res.text() };
};

function hostOf(raw: string): string {
  return URL.canParse(raw) ? new URL(raw).hostname : "unparseable";
}

// ---------------------------------------------------------------------------
// Gate
// ---------------------------------------------------------------------------

export class NetworkEgressGate {
  private readonly mode: EgressMode;
  private readonly allowlist: EgressAllowlist;
  private readonly transport: EgressTransport;
  private readonly evidence?: EvidenceChain;
  private readonly logger: Logger;
  private readonly defaultTimeoutMs: number;

  constructor(deps: NetworkEgressGateDeps) {
    this.mode = deps.mode;
    this.allowlist = EgressAllowlistSchema.parse(deps.allowlist ?? EMPTY_ALLOWLIST);
    this.transport = deps.transport ?? fetchTransport;
    this.evidence = deps.evidence;
    this.logger = deps.logger ?? silentLogger();
    this.defaultTimeoutMs = deps.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  get currentMode(): EgressMode {
    return this.mode;
  }

  /** Pure policy check; no logging, no I/O. */
  check(request: Pick<EgressRequest, "connectorId" | "url" | "method">): EgressCheck {
    if (this.mode === "offline") {
      return { allowed: false, reason: "offline mode: all egress denied" };
    }

    if (!URL.canParse(request.url)) {
      return { allowed: false, reason: "URL does not parse" };
    }
    const url = new URL(request.url);
    if (url.protocol !== "https:") {
      return { allowed: false, reason: `scheme ${url.protocol.replace(/:$/, "")} forbidden; HTTPS required` };
    }
    if (url.username || url.password) {
      return { allowed: false, reason: "credentials in URL are forbidden" };
    }

    if (this.mode === "dev") return { allowed: true, url };

    const rule = this.allowlist.connectors[request.connectorId];
    if (!rule) {
      return { allowed: false, reason: `connector ${request.connectorId} is not registered` };
    }
    const host = url.hostname.toLowerCase();
    if (!rule.hosts.includes(host)) {
      return { allowed: false, reason: `host ${host} not allowed for connector ${request.connectorId}` };
    }
    if (!rule.pathPrefixes.some((prefix) => url.pathname.startsWith(prefix))) {
      return { allowed: false, reason: `path ${url.pathname} not allowed for host ${host}` };
    }
    const method = request.method ?? "GET";
    if (!rule.methods.includes(method)) {
      return { allowed: false, reason: `method ${method} not allowed for connector ${request.connectorId}` };
    }
    return { allowed: true, url };
  }

  async execute(request: EgressRequest): Promise<EgressResponse> {
    const verdict = this.check(request);
    if (!verdict.allowed) {
      this.recordViolation(request, verdict.reason);
      throw new GovernanceError(
        `Network egress blocked: ${verdict.reason}`,
        "NETWORK_BLOCKED",
        { connectorId: request.connectorId, reason: verdict.reason },
      );
    }

    const method = request.method ?? "GET";
    this.logger.debug(
      { connectorId: request.connectorId, host: verdict.url.hostname, method },
      "egress allowed",
    );
    return this.transport({
      url: verdict.url.toString(),
      method,
      headers: request.headers ?? {},
      body: request.body,
      signal: AbortSignal.timeout(request.timeoutMs ?? this.defaultTimeoutMs),
    });
  }

  private recordViolation(request: EgressRequest, reason: string): void {
    this.logger.warn({ connectorId: request.connectorId, reason }, "network egress blocked");
    // Host only; query strings may carry user content.
    this.evidence?.append("network_violation", request.connectorId, {
      mode: this.mode,
      host: hostOf(request.url),
      method: request.method ?? "GET",
      reason,
    });
  }
}
