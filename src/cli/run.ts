/**
 * govctl argument parsing and dispatch.
 *
 * runCli never exits the process; it returns the exit code so the bin
 * entry (and tests) decide what to do with it.
 */

import { resolveConfig } from "./config.js";
import {
  cmdConfigShow,
  cmdDeviceList,
  cmdDeviceRegister,
  cmdDeviceTransition,
  cmdDiagnostics,
  cmdEgressCheck,
  cmdEvidenceExport,
  cmdEvidenceList,
  cmdEvidenceMirror,
  cmdEvidenceVerify,
  cmdInit,
  cmdPolicyCheck,
  cmdPolicySet,
  cmdPolicyShow,
  cmdTraceExport,
  cmdTraceList,
  cmdTrustRevokeKey,
  cmdTrustRotateKey,
  cmdTrustShow,
  stdio,
  type CliIo,
} from "./commands.js";

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

export function parseArgs(argv: readonly string[]): {
  positional: string[];
  flags: Map<string, string>;
  boolFlags: Set<string>;
} {
  const positional: string[] = [];
  const flags = new Map<string, string>();
  const boolFlags = new Set<string>();

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];
    if (arg.startsWith("--")) {
      const name = arg.slice(2);
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith("--")) {
        flags.set(name, next);
        i += 2;
      } else {
        // Boolean flag (no value)
        boolFlags.add(name);
        flags.set(name, "true");
        i += 1;
      }
    } else {
      positional.push(arg);
      i += 1;
    }
  }

  return { positional, flags, boolFlags };
}

// ---------------------------------------------------------------------------
// Usage
// ---------------------------------------------------------------------------

export const USAGE = `govctl - governance kernel CLI

Usage:
  govctl init
  govctl config show [--json]
  govctl evidence list [--type <t>] [--subject <id>] [--limit <n>] [--json]
  govctl evidence verify [--json]
  govctl evidence export [--out <zipPath>] [--json]
  govctl evidence mirror --target <jsonlPath> [--json]
  govctl trust show [--json]
  govctl trust rotate-key --reason <text> [--json]
  govctl trust revoke-key --version <n> [--reason <text>] [--json]
  govctl device list [--json]
  govctl device register --fingerprint <fp> [--name <text>] [--json]
  govctl device suspend|reinstate|revoke --fingerprint <fp> [--json]
  govctl policy show [--json]
  govctl policy set --file <policy.yaml> [--json]
  govctl policy check --capability <name> [--json]
  govctl egress check --connector <id> --url <url> [--method GET|POST] [--json]
  govctl diagnostics [--json]
  govctl trace list [--limit <n>] [--json]
  govctl trace export --id <traceId|sessionId> [--out <file>]

Environment:
  GOVKERNEL_HOME                 Base directory (default ~/.govkernel)
  GOVKERNEL_DB_PATH              Override SQLite database path
  GOVKERNEL_POLICY_PATH          Override operator policy file
  GOVKERNEL_TRUST_PATH           Override trust state file
  GOVKERNEL_ALLOWLIST_PATH       Override egress allowlist file
  GOVKERNEL_EXPORT_DIR           Default evidence export directory
  GOVKERNEL_LOG_LEVEL            Log level (default warn)
  GOVKERNEL_DEVICE_FINGERPRINT   This device's fingerprint
  GOVKERNEL_EGRESS_MODE          offline | allowlist | dev
  GOVKERNEL_SESSION_TTL_SECONDS  Approval session TTL
`;

function unknownSub(io: CliIo, group: string, choices: string): number {
  io.err(`Unknown ${group} subcommand. Use: ${choices}`);
  return 1;
}

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

export async function runCli(
  argv: readonly string[],
  io: CliIo = stdio,
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  if (argv.length === 0) {
    io.err(USAGE);
    return 1;
  }

  const { positional, flags, boolFlags } = parseArgs(argv);
  const json = boolFlags.has("json");

  // Handle help flags before command dispatch
  if (boolFlags.has("help") || boolFlags.has("h") || positional[0] === "help") {
    io.out(USAGE);
    return 0;
  }

  const config = resolveConfig(env);
  const [command, sub] = positional;

  switch (command) {
    case "init":
      return cmdInit(config, io);

    case "config":
      if (sub === "show") return cmdConfigShow(config, json, io);
      return unknownSub(io, "config", "config show");

    case "evidence":
      switch (sub) {
        case "list":
          return cmdEvidenceList(flags, config, json, io);
        case "verify":
          return cmdEvidenceVerify(config, json, io);
        case "export":
          return cmdEvidenceExport(flags, config, json, io);
        case "mirror":
          return cmdEvidenceMirror(flags, config, json, io);
        default:
          return unknownSub(io, "evidence", "list | verify | export | mirror");
      }

    case "trust":
      switch (sub) {
        case "show":
          return cmdTrustShow(config, json, io);
        case "rotate-key":
          return cmdTrustRotateKey(flags, config, json, io);
        case "revoke-key":
          return cmdTrustRevokeKey(flags, config, json, io);
        default:
          return unknownSub(io, "trust", "show | rotate-key | revoke-key");
      }

    case "device":
      switch (sub) {
        case "list":
          return cmdDeviceList(config, json, io);
        case "register":
          return cmdDeviceRegister(flags, config, json, io);
        case "suspend":
        case "reinstate":
        case "revoke":
          return cmdDeviceTransition(sub, flags, config, json, io);
        default:
          return unknownSub(io, "device", "list | register | suspend | reinstate | revoke");
      }

    case "policy":
      switch (sub) {
        case "show":
          return cmdPolicyShow(config, json, io);
        case "set":
          return cmdPolicySet(flags, config, json, io);
        case "check":
          return cmdPolicyCheck(flags, config, json, io);
        default:
          return unknownSub(io, "policy", "show | set | check");
      }

    case "egress":
      if (sub === "check") return cmdEgressCheck(flags, config, json, io);
      return unknownSub(io, "egress", "egress check");

    case "diagnostics":
      return cmdDiagnostics(config, json, io);

    case "trace":
      switch (sub) {
        case "list":
          return cmdTraceList(flags, config, json, io);
        case "export":
          return cmdTraceExport(flags, config, io);
        default:
          return unknownSub(io, "trace", "list | export");
      }

    default:
      io.err(`Unknown command: ${command}\n\n${USAGE}`);
      return 1;
  }
}
