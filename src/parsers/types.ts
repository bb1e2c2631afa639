/**
 * Record types extracted from readelf reports.
 */

/** One entry of the section header table. */
export interface Section {
  readonly name: string;
  /** Size in bytes, read from the hexadecimal Size column */
  readonly size: number;
}

/** One row of the program header table, in load order. */
export interface ProgramHeader {
  /** Segment type (e.g., "LOAD", "DYNAMIC", "GNU_STACK") */
  readonly type: string;
  /** Permission letters drawn from R, W, E with blanks removed (e.g., "RE") */
  readonly flags: string;
}

/** One tag/value entry of the dynamic section. */
export interface DynamicEntry {
  /** Tag without parentheses (e.g., "NEEDED", "SONAME") */
  readonly key: string;
  readonly value: string;
}

export interface ElfSymbol {
  /** FUNC, OBJECT, SECTION, NOTYPE, ... */
  readonly type: string;
  /** GLOBAL, LOCAL, WEAK */
  readonly bind: string;
  /** DEFAULT, HIDDEN, PROTECTED, INTERNAL */
  readonly visibility: string;
  /** Ndx column: a section number, or UND / ABS / COM */
  readonly sectionIndex: string;
  /** Empty for unnamed symbols */
  readonly name: string;
}

/**
 * One group of records per object report found in the output. An archive
 * yields one group per member that has a table.
 */
export type ReportCollection<T> = readonly (readonly T[])[];
