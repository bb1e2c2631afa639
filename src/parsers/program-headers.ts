/**
 * Parser for readelf -W -l (program headers) output.
 *
 *   Program Headers:
 *     Type           Offset   VirtAddr           PhysAddr           FileSiz  MemSiz   Flg Align
 *     INTERP         0x0002a8 0x00000000004002a8 0x00000000004002a8 0x00001c 0x00001c R   0x1
 *         [Requesting program interpreter: /lib64/ld-linux-x86-64.so.2]
 *     LOAD           0x001000 0x0000000000401000 0x0000000000401000 0x0002ad 0x0002ad R E 0x1000
 *     GNU_STACK      0x000000 0x0000000000000000 0x0000000000000000 0x000000 0x000000 RW  0x10
 */

import type { IntrospectError } from "../errors/introspect-error.js";
import { runView, type RunContext } from "../tools/run-view.js";
import { ElfReport } from "./report.js";
import { scanBlocks, type BlockLayout } from "./scan.js";
import type { ProgramHeader, ReportCollection } from "./types.js";

const LAYOUT: BlockLayout = { header: "Program Headers:", skip: 2 };

// Type, five numeric columns, then the three-character Flg column
const HEADER_LINE = /\s+(?<type>\w+)(?:\s+\w+){5}\s+(?<flags>[RWE ]{3})/;

export function parseProgramHeaderLine(line: string): ProgramHeader | null {
  const groups = HEADER_LINE.exec(line)?.groups;
  if (!groups) return null;
  return { type: groups.type, flags: groups.flags.replace(/ /g, "") };
}

export function parseProgramHeaders(text: string): ReportCollection<ProgramHeader> {
  const groups: ProgramHeader[][] = [];
  for (const block of scanBlocks(text, LAYOUT)) {
    const headers: ProgramHeader[] = [];
    for (const line of block) {
      // Annotation rows such as the interpreter path do not match
      const header = parseProgramHeaderLine(line);
      if (header) headers.push(Object.freeze(header));
    }
    groups.push(headers);
  }
  return groups;
}

export class ProgramHeaderReport extends ElfReport {
  readonly groups: ReportCollection<ProgramHeader>;

  private constructor(groups: ReportCollection<ProgramHeader>, failure: IntrospectError | null) {
    super(failure);
    this.groups = Object.freeze(groups.map((group) => Object.freeze([...group])));
  }

  static fromText(text: string): ProgramHeaderReport {
    return new ProgramHeaderReport(parseProgramHeaders(text), null);
  }

  static async parse(targetPath: string, ctx: RunContext): Promise<ProgramHeaderReport> {
    const outcome = await runView("program-headers", targetPath, ctx);
    if (!outcome.ok) return new ProgramHeaderReport([], outcome.error);
    return new ProgramHeaderReport(parseProgramHeaders(outcome.stdout), null);
  }

  /** Headers of every object, in load order. */
  get headers(): readonly ProgramHeader[] {
    return this.groups.flat();
  }

  find(type: string): ProgramHeader[] {
    return this.headers.filter((header) => header.type === type);
  }
}
