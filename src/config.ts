import path from "node:path";
import type { CliArgs, RuntimeConfig } from "./types.js";
import { splitArguments } from "./utils/strings.js";

export function parsePositiveInt(
  value: string | undefined,
  fallback: number,
): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return fallback;
  }

  return parsed;
}

export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no" || normalized === "off") {
    return false;
  }
  return fallback;
}

export function loadRuntimeConfig(
  workspaceRoot: string,
  cliArgs: CliArgs,
  env: NodeJS.ProcessEnv = process.env,
): RuntimeConfig {
  const resolvedWorkspaceRoot = path.resolve(workspaceRoot);
  const stateDir = path.resolve(
    resolvedWorkspaceRoot,
    env.SOURCEKIT_STATE_DIR ?? ".sourcekit-json",
  );

  return {
    workspaceRoot: resolvedWorkspaceRoot,
    bridgePath: cliArgs.bridgePath ?? env.SOURCEKIT_BRIDGE_PATH ?? "sourcekitd-bridge",
    bridgeArgs: splitArguments(env.SOURCEKIT_BRIDGE_ARGS ?? ""),
    requestTimeoutMs: cliArgs.timeoutMs ?? parsePositiveInt(env.SOURCEKIT_TIMEOUT_MS, 120_000),
    stateDir,
    audit: cliArgs.audit ?? parseBoolean(env.SOURCEKIT_AUDIT, false),
    verbose: cliArgs.verbose ?? parseBoolean(env.SOURCEKIT_VERBOSE, false),
  };
}
