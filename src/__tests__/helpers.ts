import { vi } from "vitest";
import type { Connector } from "../connectors/index.js";
import type { RunContext } from "../tools/run-view.js";

export function createMockConnector(): Connector {
  return {
    execute: vi.fn(),
  };
}

export function createMockContext(overrides?: Partial<RunContext>): RunContext {
  return {
    connector: createMockConnector(),
    readelf: "readelf",
    ...overrides,
  };
}

export function ok(stdout: string) {
  return { stdout, exitCode: 0 };
}

export function fail(exitCode = 1) {
  return { stdout: "", exitCode };
}
