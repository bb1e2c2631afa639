/**
 * ObjectIntrospector — everything readelf reports about one object file.
 */

import type { Connector } from "./connectors/index.js";
import { LocalConnector } from "./connectors/local.js";
import { IntrospectError } from "./errors/introspect-error.js";
import { DynamicSectionReport } from "./parsers/dynamic-section.js";
import { ProgramHeaderReport } from "./parsers/program-headers.js";
import { SectionReport } from "./parsers/sections.js";
import { SymbolTableReport } from "./parsers/symbol-table.js";
import { introspectOptionsSchema, type IntrospectOptions } from "./schemas/options.js";
import type { RunContext } from "./tools/run-view.js";

const SHARED_LIBRARY_PATH = /\/lib(64)?\/[^/]+\.so(\.[0-9]+)*$/;

export interface PathClassification {
  isArchive: boolean;
  isSharedLibrary: boolean;
  isDebugInfo: boolean;
}

/**
 * Classify an object by its path alone.
 *
 *   /usr/lib64/libfoo.so.2        → shared library
 *   /usr/lib/libfoo.a             → archive
 *   /usr/lib/debug/bin/ls.debug   → detached debug info
 */
export function classifyPath(memberPath: string): PathClassification {
  return {
    isArchive: memberPath.endsWith(".a"),
    isSharedLibrary: SHARED_LIBRARY_PATH.test(memberPath),
    isDebugInfo: memberPath.endsWith(".debug"),
  };
}

export interface ObjectReports {
  sections: SectionReport;
  programHeaders: ProgramHeaderReport;
  dynamic: DynamicSectionReport;
  symbols: SymbolTableReport;
}

export class ObjectIntrospector implements PathClassification {
  readonly path: string;
  readonly isArchive: boolean;
  readonly isSharedLibrary: boolean;
  readonly isDebugInfo: boolean;
  readonly sections: SectionReport;
  readonly programHeaders: ProgramHeaderReport;
  readonly dynamic: DynamicSectionReport;
  readonly symbols: SymbolTableReport;

  constructor(memberPath: string, reports: ObjectReports) {
    const classification = classifyPath(memberPath);
    this.path = memberPath;
    this.isArchive = classification.isArchive;
    this.isSharedLibrary = classification.isSharedLibrary;
    this.isDebugInfo = classification.isDebugInfo;
    this.sections = reports.sections;
    this.programHeaders = reports.programHeaders;
    this.dynamic = reports.dynamic;
    this.symbols = reports.symbols;
  }

  /** True when readelf failed for any of the four reports. */
  failed(): boolean {
    return (
      this.sections.parsingFailed ||
      this.programHeaders.parsingFailed ||
      this.dynamic.parsingFailed ||
      this.symbols.parsingFailed
    );
  }
}

/**
 * Run readelf four times against `packageFilePath` and collect the reports.
 *
 * `memberPath` is the path the object has inside its package; it only drives
 * classification and may differ from the extracted file that readelf reads.
 * Tool failures are recorded on the reports. A SONAME in an unknown shape
 * rejects with ReportShapeError; invalid options reject with an
 * IntrospectError in the validation category.
 */
export async function introspect(
  packageFilePath: string,
  memberPath: string,
  options: IntrospectOptions = {},
  connector: Connector = new LocalConnector(),
): Promise<ObjectIntrospector> {
  const parsed = introspectOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new IntrospectError(`Invalid introspect options: ${detail}`, "INVALID_OPTIONS", "validation");
  }
  const { readelf, timeout } = parsed.data;
  const ctx: RunContext = { connector, readelf, timeout };

  // One readelf at a time
  const sections = await SectionReport.parse(packageFilePath, ctx);
  const programHeaders = await ProgramHeaderReport.parse(packageFilePath, ctx);
  const dynamic = await DynamicSectionReport.parse(packageFilePath, ctx);
  const symbols = await SymbolTableReport.parse(packageFilePath, ctx);

  return new ObjectIntrospector(memberPath, { sections, programHeaders, dynamic, symbols });
}
