#!/usr/bin/env node
import "dotenv/config";
import { stderr, stdout } from "node:process";
import { parseArgs } from "./args.js";
import { AuditLogger } from "./audit/auditLogger.js";
import { BridgeService } from "./bridge/bridgeService.js";
import { ChildProcessTransport } from "./bridge/transport.js";
import { loadRuntimeConfig } from "./config.js";
import { formatError } from "./sourcekit/errors.js";
import { SourceKitPipeline } from "./sourcekit/pipeline.js";
import { arrayValue, int64Value } from "./sourcekit/responseValue.js";
import { syntaxTokensToValue, toJson } from "./sourcekit/serialize.js";
import type { CliCommand, RuntimeConfig } from "./types.js";

class ConsoleUI {
  private readonly verbose: boolean;

  public constructor(verbose: boolean) {
    this.verbose = verbose;
  }

  public print(document: string): void {
    stdout.write(`${document}\n`);
  }

  public info(message: string): void {
    if (this.verbose) {
      stderr.write(`${message}\n`);
    }
  }

  public warn(message: string): void {
    stderr.write(`WARN: ${message}\n`);
  }
}

function printHelp(): void {
  stdout.write(
    [
      "sourcekit-json",
      "",
      "Usage:",
      "  sourcekit-json --structure <file>",
      "  sourcekit-json --syntax <file>",
      "  sourcekit-json --syntax-text <swift source>",
      "  sourcekit-json --doc-offsets <file>",
      "  sourcekit-json [options] --docs <compiler arguments...>",
      "",
      "Options:",
      "  --bridge <path>      sourcekitd helper executable (default from SOURCEKIT_BRIDGE_PATH)",
      "  --timeout-ms <num>   Per-request timeout (default from SOURCEKIT_TIMEOUT_MS)",
      "  --audit              Record bridge traffic under the state directory",
      "  --verbose            Print bridge diagnostics to stderr",
      "  -h, --help           Show help",
      "",
    ].join("\n"),
  );
}

async function runCommand(
  command: CliCommand,
  pipeline: SourceKitPipeline,
  ui: ConsoleUI,
): Promise<void> {
  switch (command.name) {
    case "structure":
      ui.print(toJson(await pipeline.structure(command.file)));
      return;
    case "syntax":
      ui.print(toJson(syntaxTokensToValue(await pipeline.syntax({ file: command.file }))));
      return;
    case "syntax-text":
      ui.print(toJson(syntaxTokensToValue(await pipeline.syntax({ text: command.text }))));
      return;
    case "doc-offsets": {
      const offsets = await pipeline.documentedTokenOffsets(command.file);
      ui.print(toJson(arrayValue(offsets.map((offset) => int64Value(offset)))));
      return;
    }
    case "docs": {
      const results = await pipeline.docs(command.compilerArgs);
      if (results.length === 0) {
        ui.warn("No .swift files found among the compiler arguments.");
      }
      for (const result of results) {
        ui.info(`Documented ${result.file}`);
        ui.print(toJson(result.response));
      }
      return;
    }
  }
}

function createService(config: RuntimeConfig, ui: ConsoleUI): BridgeService {
  const audit = config.audit
    ? new AuditLogger(config.stateDir, AuditLogger.newSessionId(), (message) => ui.warn(message))
    : undefined;
  if (audit) {
    ui.info(`Auditing bridge traffic to ${audit.getAuditPath()}`);
  }

  return new BridgeService({
    transport: new ChildProcessTransport({
      command: config.bridgePath,
      args: config.bridgeArgs,
      cwd: config.workspaceRoot,
    }),
    timeoutMs: config.requestTimeoutMs,
    audit,
    onStderr: (text) => ui.info(`bridge: ${text.trimEnd()}`),
  });
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    printHelp();
    return;
  }

  const config = loadRuntimeConfig(process.cwd(), args);
  const ui = new ConsoleUI(config.verbose);

  for (const message of args.errors) {
    ui.warn(message);
  }
  if (!args.command) {
    printHelp();
    process.exitCode = 1;
    return;
  }

  const service = createService(config, ui);
  try {
    await service.initialize();
    await runCommand(args.command, new SourceKitPipeline(service), ui);
  } finally {
    await service.shutdown().catch((error: unknown) => {
      ui.warn(`Bridge shutdown failed: ${formatError(error)}`);
    });
  }
}

main().catch((error: unknown) => {
  stderr.write(`Fatal error: ${formatError(error)}\n`);
  process.exitCode = 1;
});
