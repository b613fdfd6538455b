import { spawn, type ChildProcessWithoutNullStreams } from "node:child_process";
import readline from "node:readline";

export interface TransportHandlers {
  onLine(line: string): void;
  onStderr(text: string): void;
  onExit(code: number | null): void;
  onError(error: Error): void;
}

/** Duplex line channel to the helper. Tests substitute an in-memory one. */
export interface BridgeTransport {
  start(handlers: TransportHandlers): void;
  send(line: string): void;
  close(): Promise<void>;
}

export interface ChildProcessTransportOptions {
  command: string;
  args: string[];
  cwd: string;
  env?: NodeJS.ProcessEnv;
}

export class ChildProcessTransport implements BridgeTransport {
  private readonly options: ChildProcessTransportOptions;
  private child: ChildProcessWithoutNullStreams | null = null;
  private exited: Promise<void> = Promise.resolve();

  public constructor(options: ChildProcessTransportOptions) {
    this.options = options;
  }

  public start(handlers: TransportHandlers): void {
    if (this.child) {
      return;
    }

    const child = spawn(this.options.command, this.options.args, {
      cwd: this.options.cwd,
      env: this.options.env ?? process.env,
      windowsHide: true,
    });
    this.child = child;

    const lines = readline.createInterface({ input: child.stdout, crlfDelay: Infinity });
    lines.on("line", (line) => {
      if (line.trim()) {
        handlers.onLine(line);
      }
    });

    child.stdin.on("error", (error) => {
      handlers.onError(error);
    });

    child.stderr.on("data", (chunk: Buffer) => {
      handlers.onStderr(chunk.toString("utf8"));
    });

    this.exited = new Promise<void>((resolve) => {
      child.on("error", (error) => {
        this.child = null;
        handlers.onError(error);
        resolve();
      });
      child.on("close", (code) => {
        lines.close();
        this.child = null;
        handlers.onExit(code);
        resolve();
      });
    });
  }

  public send(line: string): void {
    if (!this.child) {
      throw new Error("Bridge process is not running.");
    }
    this.child.stdin.write(`${line}\n`);
  }

  public async close(): Promise<void> {
    if (!this.child) {
      return;
    }
    this.child.stdin.end();
    const timer = setTimeout(() => this.child?.kill(), 2_000);
    try {
      await this.exited;
    } finally {
      clearTimeout(timer);
    }
  }
}
