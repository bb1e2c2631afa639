/**
 * Parser for readelf -W -s (symbol table) output.
 *
 *   Symbol table '.symtab' contains 12 entries:
 *      Num:    Value          Size Type    Bind   Vis      Ndx Name
 *        9: 0000000000000000     0 SECTION LOCAL  DEFAULT    6
 *       10: 0000000000000000    18 FUNC    GLOBAL DEFAULT    4 main
 *
 * There is no table delimiter here: every line that looks like a symbol row is taken.
 */

import type { IntrospectError } from "../errors/introspect-error.js";
import { runView, type RunContext } from "../tools/run-view.js";
import { ElfReport } from "./report.js";
import { splitLines } from "./scan.js";
import type { ElfSymbol } from "./types.js";

// Num: Value Size Type Bind Vis Ndx [Name]
const SYMBOL_LINE =
  /^\s*\d+:\s\w+\s+\w+\s+(?<type>\w+)\s+(?<bind>\w+)\s+(?<visibility>\w+)\s+(?<ndx>\w+)(?:\s+(?<name>\S+))?/;

export function parseSymbolLine(line: string): ElfSymbol | null {
  const groups = SYMBOL_LINE.exec(line)?.groups;
  if (!groups) return null;
  return {
    type: groups.type,
    bind: groups.bind,
    visibility: groups.visibility,
    sectionIndex: groups.ndx,
    name: groups.name ?? "",
  };
}

export function parseSymbolTable(text: string): ElfSymbol[] {
  const symbols: ElfSymbol[] = [];
  for (const line of splitLines(text)) {
    const symbol = parseSymbolLine(line);
    if (symbol) symbols.push(Object.freeze(symbol));
  }
  return symbols;
}

export class SymbolTableReport extends ElfReport {
  readonly symbols: readonly ElfSymbol[];

  private constructor(symbols: ElfSymbol[], failure: IntrospectError | null) {
    super(failure);
    this.symbols = Object.freeze(symbols);
  }

  static fromText(text: string): SymbolTableReport {
    return new SymbolTableReport(parseSymbolTable(text), null);
  }

  static async parse(targetPath: string, ctx: RunContext): Promise<SymbolTableReport> {
    const outcome = await runView("symbols", targetPath, ctx);
    if (!outcome.ok) return new SymbolTableReport([], outcome.error);
    return new SymbolTableReport(parseSymbolTable(outcome.stdout), null);
  }

  /**
   * FUNC symbols whose name contains a match for `pattern`.
   * A string is compiled as a regular expression.
   */
  functionsMatching(pattern: RegExp | string): ElfSymbol[] {
    // search() ignores lastIndex but anchors a sticky pattern at the start, so drop /y
    const regex = typeof pattern === "string"
      ? new RegExp(pattern)
      : new RegExp(pattern.source, pattern.flags.replace("y", ""));
    return this.symbols.filter((sym) => sym.type === "FUNC" && sym.name.search(regex) !== -1);
  }

  /** Named symbols this object expects another object to define. */
  undefinedSymbols(): ElfSymbol[] {
    return this.symbols.filter((sym) => sym.sectionIndex === "UND" && sym.name !== "");
  }
}
