/**
 * readelf views — the fixed argument set used for each report kind.
 *
 * Every view runs in wide mode so no column is truncated.
 */

export type ReportKind = "sections" | "program-headers" | "dynamic" | "symbols";

export interface ReadelfView {
  kind: ReportKind;
  /** Arguments placed between the command and the file path */
  fixedArgs: string[];
}

export const READELF_VIEWS: Record<ReportKind, ReadelfView> = {
  "sections": { kind: "sections", fixedArgs: ["-W", "-S"] },
  "program-headers": { kind: "program-headers", fixedArgs: ["-W", "-l"] },
  "dynamic": { kind: "dynamic", fixedArgs: ["-W", "-d"] },
  "symbols": { kind: "symbols", fixedArgs: ["-W", "-s"] },
};

/**
 * Build the argv for one view.
 *
 * Example: buildReadelfCommand("readelf", "dynamic", "/tmp/libfoo.so")
 *   → ["readelf", "-W", "-d", "/tmp/libfoo.so"]
 */
export function buildReadelfCommand(readelf: string, kind: ReportKind, filePath: string): string[] {
  return [readelf, ...READELF_VIEWS[kind].fixedArgs, filePath];
}
