export { introspect, classifyPath, ObjectIntrospector } from "./introspector.js";
export type { ObjectReports, PathClassification } from "./introspector.js";

export { SectionReport, parseSectionTable, parseSectionLine, PIC_SECTION } from "./parsers/sections.js";
export type { SectionTable } from "./parsers/sections.js";
export type { DynamicTable } from "./parsers/dynamic-section.js";
export { ProgramHeaderReport, parseProgramHeaders, parseProgramHeaderLine } from "./parsers/program-headers.js";
export { DynamicSectionReport, parseDynamicSection, parseDynamicLine, deriveSoname } from "./parsers/dynamic-section.js";
export { SymbolTableReport, parseSymbolTable, parseSymbolLine } from "./parsers/symbol-table.js";
export { ElfReport } from "./parsers/report.js";
export { scanBlocks } from "./parsers/scan.js";
export type { BlockLayout } from "./parsers/scan.js";
export type { Section, ProgramHeader, DynamicEntry, ElfSymbol, ReportCollection } from "./parsers/types.js";

export { LocalConnector } from "./connectors/local.js";
export type { Connector, ExecOptions, ExecResult } from "./connectors/index.js";
export { IntrospectError, ReportShapeError } from "./errors/introspect-error.js";
export type { ErrorCategory } from "./errors/introspect-error.js";
export { toIntrospectError } from "./errors/error-mapper.js";
export { introspectOptionsSchema } from "./schemas/options.js";
export type { IntrospectOptions } from "./schemas/options.js";
export { READELF_VIEWS, buildReadelfCommand } from "./tools/readelf.js";
export type { ReportKind, ReadelfView } from "./tools/readelf.js";
