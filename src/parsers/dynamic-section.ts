/**
 * Parser for readelf -W -d (dynamic section) output.
 *
 *   Dynamic section at offset 0x1b9b60 contains 27 entries:
 *     Tag        Type                         Name/Value
 *    0x0000000000000001 (NEEDED)             Shared library: [ld-linux-x86-64.so.2]
 *    0x000000000000000e (SONAME)             Library soname: [libc.so.6]
 *    0x000000000000001e (FLAGS)              BIND_NOW STATIC_TLS
 *
 * The report is read as one flat group, archives included.
 */

import { ReportShapeError, type IntrospectError } from "../errors/introspect-error.js";
import { runView, type RunContext } from "../tools/run-view.js";
import { ElfReport } from "./report.js";
import { scanBlocks, type BlockLayout } from "./scan.js";
import type { DynamicEntry } from "./types.js";

// Everything after the heading and the column titles belongs to the table
const LAYOUT: BlockLayout = { header: "Dynamic section at offset", skip: 2, stopAtBlank: false };

const ENTRY_LINE = /\s+\w*\s+\((?<key>\w+)\)\s+(?<value>.*)/;
const SONAME_PREFIX = "Library soname: [";
const SONAME_SUFFIX = "]";

export function parseDynamicLine(line: string): DynamicEntry | null {
  const groups = ENTRY_LINE.exec(line)?.groups;
  if (!groups) return null;
  return { key: groups.key, value: groups.value.trimEnd() };
}

export interface DynamicTable {
  entries: DynamicEntry[];
  /** Whether a dynamic section heading was present */
  found: boolean;
}

export function parseDynamicSection(text: string): DynamicTable {
  const entries: DynamicEntry[] = [];
  // Everything after the first heading, later tables included
  const first = scanBlocks(text, LAYOUT).next();
  if (first.done) return { entries, found: false };
  for (const line of first.value) {
    const entry = parseDynamicLine(line);
    if (entry) entries.push(Object.freeze(entry));
  }
  return { entries, found: true };
}

/**
 * Name advertised by a single SONAME entry.
 *
 * @throws ReportShapeError when the one SONAME value is not wrapped as
 *   `Library soname: [<name>]`
 */
export function deriveSoname(values: readonly string[]): string | null {
  if (values.length !== 1) return null;
  const [value] = values;
  if (!value.startsWith(SONAME_PREFIX) || !value.endsWith(SONAME_SUFFIX)) {
    throw new ReportShapeError(`Unexpected SONAME value: ${value}`, value);
  }
  return value.slice(SONAME_PREFIX.length, -SONAME_SUFFIX.length);
}

export class DynamicSectionReport extends ElfReport {
  readonly entries: readonly DynamicEntry[];
  readonly soname: string | null;
  readonly found: boolean;

  private constructor(table: DynamicTable, failure: IntrospectError | null) {
    super(failure);
    this.entries = Object.freeze([...table.entries]);
    this.found = table.found;
    this.soname = failure ? null : deriveSoname(this.get("SONAME"));
  }

  static fromText(text: string): DynamicSectionReport {
    return new DynamicSectionReport(parseDynamicSection(text), null);
  }

  static async parse(targetPath: string, ctx: RunContext): Promise<DynamicSectionReport> {
    const outcome = await runView("dynamic", targetPath, ctx);
    if (!outcome.ok) return new DynamicSectionReport({ entries: [], found: false }, outcome.error);
    return new DynamicSectionReport(parseDynamicSection(outcome.stdout), null);
  }

  /** Values of every entry with this tag, in report order. */
  get(key: string): string[] {
    return this.entries.filter((entry) => entry.key === key).map((entry) => entry.value);
  }

  has(key: string): boolean {
    return this.entries.some((entry) => entry.key === key);
  }

  get needed(): string[] {
    return this.get("NEEDED");
  }
}
