import { spawn } from "child_process";
import type { Connector, ExecOptions, ExecResult } from "./index.js";

// Only pass essential vars through to the child
const ALLOWED_ENV_VARS = [
  "PATH",
  "HOME",
  "USER",
  "TMPDIR",
];

export class LocalConnector implements Connector {
  async execute(command: string[], options: ExecOptions = {}): Promise<ExecResult> {
    if (command.length === 0) {
      throw new Error("Command array cannot be empty");
    }

    const [cmd, ...args] = command;

    const filteredEnv: NodeJS.ProcessEnv = {};
    for (const key of ALLOWED_ENV_VARS) {
      if (process.env[key]) {
        filteredEnv[key] = process.env[key];
      }
    }
    // readelf localizes its headings; the parsers expect the C locale
    filteredEnv.LC_ALL = "C";

    return new Promise((resolve, reject) => {
      let timedOut = false;
      let stdout = "";

      const proc = spawn(cmd, args, {
        env: filteredEnv,
        stdio: ["ignore", "pipe", "ignore"],
      });

      const timer = options.timeout
        ? setTimeout(() => {
            timedOut = true;
            proc.kill("SIGKILL");
            reject(new Error(`Command timed out after ${options.timeout} seconds`));
          }, options.timeout * 1000)
        : undefined;

      proc.stdout.setEncoding("utf8");
      proc.stdout.on("data", (chunk: string) => {
        stdout += chunk;
      });

      proc.on("error", (err) => {
        clearTimeout(timer);
        reject(err);
      });

      proc.on("close", (code) => {
        if (timedOut) return;
        clearTimeout(timer);
        resolve({
          stdout,
          // null when the child was killed by a signal
          exitCode: code ?? 1,
        });
      });
    });
  }
}
