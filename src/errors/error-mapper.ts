/**
 * Maps raw/unknown errors into structured IntrospectError instances.
 *
 * Catch blocks around a connector call can use `toIntrospectError(err)`
 * to get a typed error with code, category, and remediation hint.
 */

import { IntrospectError } from "./introspect-error.js";

export function toIntrospectError(raw: unknown, command?: string): IntrospectError {
  if (raw instanceof IntrospectError) {
    return raw;
  }

  const msg = raw instanceof Error ? raw.message : String(raw);

  if (/ENOENT/.test(msg)) {
    return new IntrospectError(
      msg,
      "TOOL_NOT_FOUND",
      "not_found",
      `Install binutils or point --readelf at a working ${command ?? "readelf"}`,
    );
  }

  if (/timed out|timeout/i.test(msg)) {
    return new IntrospectError(
      msg,
      "COMMAND_TIMEOUT",
      "timeout",
      "Increase --timeout",
    );
  }

  return new IntrospectError(msg, "UNKNOWN_ERROR", "tool_failure");
}

export function exitStatusError(command: string[], exitCode: number): IntrospectError {
  return new IntrospectError(
    `${command.join(" ")} exited with status ${exitCode}`,
    "TOOL_FAILED",
    "tool_failure",
  );
}
