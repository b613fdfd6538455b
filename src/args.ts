import type { CliArgs, CliCommand } from "./types.js";

const FILE_COMMANDS = new Map<string, "structure" | "syntax" | "doc-offsets">([
  ["--structure", "structure"],
  ["--syntax", "syntax"],
  ["--doc-offsets", "doc-offsets"],
]);

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { errors: [] };

  const setCommand = (command: CliCommand): void => {
    if (args.command) {
      args.errors.push(`Only one command may be given; ignoring --${command.name}.`);
      return;
    }
    args.command = command;
  };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token) {
      continue;
    }

    const fileCommand = FILE_COMMANDS.get(token);
    if (fileCommand) {
      const value = argv[i + 1];
      if (value) {
        setCommand({ name: fileCommand, file: value });
        i += 1;
      } else {
        args.errors.push(`${token} needs a file path.`);
      }
      continue;
    }

    switch (token) {
      case "--syntax-text": {
        const value = argv[i + 1];
        if (value !== undefined) {
          setCommand({ name: "syntax-text", text: value });
          i += 1;
        } else {
          args.errors.push("--syntax-text needs source text.");
        }
        break;
      }
      case "--docs": {
        // Everything after --docs is handed to the compiler untouched.
        setCommand({ name: "docs", compilerArgs: argv.slice(i + 1) });
        i = argv.length;
        break;
      }
      case "--bridge": {
        const value = argv[i + 1];
        if (value) {
          args.bridgePath = value;
          i += 1;
        }
        break;
      }
      case "--timeout-ms": {
        const value = argv[i + 1];
        if (value) {
          const parsed = Number.parseInt(value, 10);
          if (Number.isFinite(parsed) && parsed > 0) {
            args.timeoutMs = parsed;
          } else {
            args.errors.push(`--timeout-ms expects a positive integer, got "${value}".`);
          }
          i += 1;
        }
        break;
      }
      case "--audit": {
        args.audit = true;
        break;
      }
      case "--verbose": {
        args.verbose = true;
        break;
      }
      case "--help":
      case "-h": {
        args.help = true;
        break;
      }
      default:
        args.errors.push(`Unknown argument "${token}".`);
        break;
    }
  }

  return args;
}
