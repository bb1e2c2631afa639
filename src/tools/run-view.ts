import type { Connector } from "../connectors/index.js";
import type { IntrospectError } from "../errors/introspect-error.js";
import { exitStatusError, toIntrospectError } from "../errors/error-mapper.js";
import { buildReadelfCommand, type ReportKind } from "./readelf.js";

export interface RunContext {
  connector: Connector;
  readelf: string;
  timeout?: number;
}

/** Captured report text, or the reason there is none. */
export type ViewOutcome =
  | { ok: true; stdout: string }
  | { ok: false; error: IntrospectError };

/**
 * Run one readelf view against a file.
 *
 * A non-zero exit, a launch error or a timeout all come back as
 * `{ ok: false }`; this function does not throw for tool problems.
 */
export async function runView(kind: ReportKind, filePath: string, ctx: RunContext): Promise<ViewOutcome> {
  const command = buildReadelfCommand(ctx.readelf, kind, filePath);
  let outcome: ViewOutcome;

  try {
    const result = await ctx.connector.execute(command, { timeout: ctx.timeout });
    outcome = result.exitCode === 0
      ? { ok: true, stdout: result.stdout }
      : { ok: false, error: exitStatusError(command, result.exitCode) };
  } catch (err) {
    outcome = { ok: false, error: toIntrospectError(err, ctx.readelf) };
  }

  if (!outcome.ok) {
    console.error(`WARNING: readelf ${kind} report unavailable for ${filePath}: ${outcome.error.message}`);
  }
  return outcome;
}
