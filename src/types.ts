export type CliCommand =
  | { name: "structure"; file: string }
  | { name: "syntax"; file: string }
  | { name: "syntax-text"; text: string }
  | { name: "doc-offsets"; file: string }
  | { name: "docs"; compilerArgs: string[] };

export interface RuntimeConfig {
  workspaceRoot: string;
  bridgePath: string;
  bridgeArgs: string[];
  requestTimeoutMs: number;
  stateDir: string;
  audit: boolean;
  verbose: boolean;
}

export interface CliArgs {
  command?: CliCommand;
  bridgePath?: string;
  timeoutMs?: number;
  audit?: boolean;
  verbose?: boolean;
  help?: boolean;
  errors: string[];
}
