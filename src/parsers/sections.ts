/**
 * Parser for readelf -W -S (section headers) output.
 *
 * Output example:
 *
 *   Section Headers:
 *     [Nr] Name              Type            Address          Off    Size   ES Flg Lk Inf Al
 *     [ 0]                   NULL            0000000000000000 000000 000000 00      0   0  0
 *     [ 1] .text             PROGBITS        0000000000000000 000040 000015 00  AX  0   0  1
 *     [ 2] .rela.text        RELA            0000000000000000 0001d8 000018 18   I  9   1  8
 *   Key to Flags:
 *     W (write), A (alloc), X (execute), ...
 *
 * Archives repeat the table once per member.
 */

import type { IntrospectError } from "../errors/introspect-error.js";
import { runView, type RunContext } from "../tools/run-view.js";
import { ElfReport } from "./report.js";
import { scanBlocks, type BlockLayout } from "./scan.js";
import type { ReportCollection, Section } from "./types.js";

// Heading, column titles and the [ 0] NULL entry
const LAYOUT: BlockLayout = { header: "Section Headers:", skip: 3, terminator: "Key to Flags:" };

// [Nr] Name Type Address Off Size ...
const SECTION_LINE = /\] (?<name>\S*)\s*\w+\s*\w*\s*\w*\s*(?<size>\w*)/;
const HEX = /^[0-9a-f]+$/i;

/** Relocation sections against code or data imply position-independent code */
export const PIC_SECTION = /\.rela?\.(data|text)/;

export interface SectionTable {
  elfFiles: ReportCollection<Section>;
  pic: boolean;
  /** Whether any section header table was present */
  found: boolean;
  /** Table lines that did not fit the section grammar */
  skippedLines: readonly string[];
}

export function parseSectionLine(line: string): Section | null {
  const groups = SECTION_LINE.exec(line)?.groups;
  if (!groups || !HEX.test(groups.size)) return null;
  return { name: groups.name, size: parseInt(groups.size, 16) };
}

export function parseSectionTable(text: string): SectionTable {
  const elfFiles: Section[][] = [];
  const skippedLines: string[] = [];
  let found = false;
  let pic = false;

  for (const block of scanBlocks(text, LAYOUT)) {
    found = true;
    const sections: Section[] = [];
    for (const line of block) {
      const section = parseSectionLine(line);
      if (!section) {
        console.error(`WARNING: skipping unrecognised section header line: ${line.trim()}`);
        skippedLines.push(line);
        continue;
      }
      sections.push(Object.freeze(section));
      if (PIC_SECTION.test(section.name)) pic = true;
    }
    if (sections.length > 0) elfFiles.push(sections);
  }

  return { elfFiles, pic, found, skippedLines };
}

export class SectionReport extends ElfReport {
  readonly elfFiles: ReportCollection<Section>;
  readonly pic: boolean;
  readonly found: boolean;
  readonly skippedLines: readonly string[];

  private constructor(table: SectionTable, failure: IntrospectError | null) {
    super(failure);
    this.elfFiles = Object.freeze(table.elfFiles.map((group) => Object.freeze([...group])));
    this.pic = table.pic;
    this.found = table.found;
    this.skippedLines = Object.freeze([...table.skippedLines]);
  }

  static fromText(text: string): SectionReport {
    return new SectionReport(parseSectionTable(text), null);
  }

  static async parse(targetPath: string, ctx: RunContext): Promise<SectionReport> {
    const outcome = await runView("sections", targetPath, ctx);
    if (!outcome.ok) {
      return new SectionReport({ elfFiles: [], pic: false, found: false, skippedLines: [] }, outcome.error);
    }
    return new SectionReport(parseSectionTable(outcome.stdout), null);
  }

  /** Sections of every object, in report order. */
  get sections(): readonly Section[] {
    return this.elfFiles.flat();
  }
}
