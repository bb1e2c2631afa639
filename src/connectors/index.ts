export interface ExecOptions {
  /** Seconds before the child is killed. Unbounded when omitted. */
  timeout?: number;
}

export interface ExecResult {
  stdout: string;
  exitCode: number;
}

/**
 * Runs one external command to completion and hands back its captured stdout.
 * stderr is never part of the result.
 */
export interface Connector {
  execute(command: string[], options?: ExecOptions): Promise<ExecResult>;
}
