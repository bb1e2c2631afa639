#!/usr/bin/env node

import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { introspect, type ObjectIntrospector } from "./introspector.js";
import type { IntrospectOptions } from "./schemas/options.js";
import type { ElfReport } from "./parsers/report.js";

export interface CliConfig {
  file?: string;
  member?: string;
  options: IntrospectOptions;
  help: boolean;
}

export function parseArgs(args: string[], env: NodeJS.ProcessEnv = process.env): CliConfig {
  const config: CliConfig = { options: {}, help: false };

  if (env.READELF) {
    config.options.readelf = env.READELF;
  }

  for (let i = 0; i < args.length; i++) {
    let arg = args[i];
    let value: string | undefined = args[i + 1];
    let usedEqualsSyntax = false;

    // Support --flag=value syntax: split on first '='
    if (arg.startsWith("--") && arg.includes("=")) {
      const eqIndex = arg.indexOf("=");
      value = arg.slice(eqIndex + 1);
      arg = arg.slice(0, eqIndex);
      usedEqualsSyntax = true;
    }

    const consumeValue = () => { if (!usedEqualsSyntax) i++; };

    switch (arg) {
      case "--member":
        config.member = value;
        consumeValue();
        break;
      case "--readelf":
        config.options.readelf = value;
        consumeValue();
        break;
      case "--timeout":
        if (value !== undefined) config.options.timeout = parseInt(value, 10);
        consumeValue();
        break;
      case "--help":
      case "-h":
        config.help = true;
        break;
      default:
        if (!arg.startsWith("-") && config.file === undefined) {
          config.file = arg;
        }
    }
  }

  return config;
}

function reportStatus(report: ElfReport) {
  return {
    parsingFailed: report.parsingFailed,
    ...(report.failure ? { error: { code: report.failure.code, message: report.failure.message } } : {}),
  };
}

/** Plain-data view of an introspection, as printed by the CLI. */
export function summarize(result: ObjectIntrospector) {
  return {
    path: result.path,
    isArchive: result.isArchive,
    isSharedLibrary: result.isSharedLibrary,
    isDebugInfo: result.isDebugInfo,
    failed: result.failed(),
    sections: { ...reportStatus(result.sections), pic: result.sections.pic, elfFiles: result.sections.elfFiles },
    programHeaders: { ...reportStatus(result.programHeaders), groups: result.programHeaders.groups },
    dynamic: { ...reportStatus(result.dynamic), soname: result.dynamic.soname, entries: result.dynamic.entries },
    symbols: { ...reportStatus(result.symbols), symbols: result.symbols.symbols },
  };
}

function printHelp() {
  console.log(`
elf-introspect - print what readelf reports about an object file as JSON

USAGE:
  elf-introspect <file> [OPTIONS]

OPTIONS:
  --member <path>         Path of the object inside its package, used for
                          classification (default: <file>)
  --readelf <command>     readelf to run (default: $READELF or readelf)
  --timeout <seconds>     Timeout per readelf run (default: none)
  -h, --help              Show this help message

EXIT STATUS:
  0  all four reports parsed
  1  readelf failed for at least one report
  2  usage error or unexpected report shape
`);
}

export async function main(args: string[]): Promise<number> {
  const config = parseArgs(args);
  if (config.help) {
    printHelp();
    return 0;
  }
  if (!config.file) {
    console.error("Missing <file>. Run with --help for usage.");
    return 2;
  }

  const result = await introspect(config.file, config.member ?? config.file, config.options);
  console.log(JSON.stringify(summarize(result), null, 2));
  return result.failed() ? 1 : 0;
}

// npm links the bin, so compare against the resolved script path
function isDirectRun(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (isDirectRun()) {
  main(process.argv.slice(2)).then(
    (code) => process.exit(code),
    (error: unknown) => {
      console.error("elf-introspect failed:", error);
      process.exit(2);
    },
  );
}
