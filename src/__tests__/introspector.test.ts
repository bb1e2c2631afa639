import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { classifyPath, introspect } from "../introspector.js";
import { IntrospectError, ReportShapeError } from "../errors/introspect-error.js";
import { fixture } from "../parsers/__tests__/fixtures.js";
import { createMockConnector, fail, ok } from "./helpers.js";

const OUTPUT_BY_FLAG: Record<string, string> = {
  "-S": fixture("sections-object.txt"),
  "-l": fixture("program-headers.txt"),
  "-d": fixture("dynamic.txt"),
  "-s": fixture("symbols.txt"),
};

function readelfStub(failingFlags: string[] = []) {
  const connector = createMockConnector();
  vi.mocked(connector.execute).mockImplementation(async (command) => {
    const flag = command[2];
    return failingFlags.includes(flag) ? fail(1) : ok(OUTPUT_BY_FLAG[flag]);
  });
  return connector;
}

describe("classifyPath", () => {
  it("recognises versioned shared libraries under lib64", () => {
    expect(classifyPath("/usr/lib64/libfoo.so.2")).toEqual({
      isArchive: false,
      isSharedLibrary: true,
      isDebugInfo: false,
    });
  });

  it("recognises unversioned shared libraries under lib", () => {
    expect(classifyPath("/usr/lib/libbar.so").isSharedLibrary).toBe(true);
  });

  it("requires a lib directory for shared libraries", () => {
    expect(classifyPath("/usr/share/plugins/libfoo.so").isSharedLibrary).toBe(false);
    expect(classifyPath("/usr/lib64/libfoo.so.2.debug").isSharedLibrary).toBe(false);
  });

  it("recognises static archives", () => {
    expect(classifyPath("/usr/lib64/libfoo.a")).toEqual({
      isArchive: true,
      isSharedLibrary: false,
      isDebugInfo: false,
    });
  });

  it("recognises detached debug info", () => {
    expect(classifyPath("/usr/lib/debug/usr/bin/demo-1.0-1.x86_64.debug").isDebugInfo).toBe(true);
  });
});

describe("introspect", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("runs the four reports in order against the package file", async () => {
    const connector = readelfStub();
    const result = await introspect("/tmp/extract/libdemo.so.1", "/usr/lib64/libdemo.so.1", {}, connector);

    expect(vi.mocked(connector.execute).mock.calls.map(([command]) => command)).toEqual([
      ["readelf", "-W", "-S", "/tmp/extract/libdemo.so.1"],
      ["readelf", "-W", "-l", "/tmp/extract/libdemo.so.1"],
      ["readelf", "-W", "-d", "/tmp/extract/libdemo.so.1"],
      ["readelf", "-W", "-s", "/tmp/extract/libdemo.so.1"],
    ]);
    expect(result.path).toBe("/usr/lib64/libdemo.so.1");
    expect(result.isSharedLibrary).toBe(true);
    expect(result.failed()).toBe(false);
    expect(result.sections.pic).toBe(true);
    expect(result.programHeaders.find("GNU_STACK")[0].flags).toBe("RW");
    expect(result.dynamic.soname).toBe("libdemo.so.1");
    expect(result.symbols.functionsMatching("main")).toHaveLength(1);
  });

  it("passes readelf and timeout options through", async () => {
    const connector = readelfStub();
    await introspect("/tmp/demo", "/usr/bin/demo", { readelf: "eu-readelf", timeout: 10 }, connector);
    expect(connector.execute).toHaveBeenCalledWith(["eu-readelf", "-W", "-S", "/tmp/demo"], { timeout: 10 });
  });

  it("reports failure when one readelf run fails", async () => {
    const result = await introspect("/tmp/demo", "/usr/bin/demo", {}, readelfStub(["-d"]));
    expect(result.failed()).toBe(true);
    expect(result.dynamic.parsingFailed).toBe(true);
    expect(result.dynamic.entries).toEqual([]);
    expect(result.sections.parsingFailed).toBe(false);
    expect(result.symbols.symbols).toHaveLength(11);
  });

  it("reports failure when every readelf run fails", async () => {
    const result = await introspect("/tmp/junk", "/usr/share/junk", {}, readelfStub(["-S", "-l", "-d", "-s"]));
    expect(result.failed()).toBe(true);
    expect(result.sections.elfFiles).toEqual([]);
    expect(result.programHeaders.groups).toEqual([]);
    expect(result.symbols.symbols).toEqual([]);
  });

  it("propagates a malformed SONAME", async () => {
    const connector = readelfStub();
    vi.mocked(connector.execute).mockImplementation(async (command) => {
      if (command[2] !== "-d") return ok("");
      return ok([
        "Dynamic section at offset 0x2e08 contains 1 entry:",
        "  Tag        Type                         Name/Value",
        " 0x000000000000000e (SONAME)             [libdemo.so.1]",
      ].join("\n"));
    });
    await expect(introspect("/tmp/lib", "/usr/lib/libdemo.so.1", {}, connector)).rejects.toBeInstanceOf(ReportShapeError);
  });

  it("rejects invalid options before running anything", async () => {
    const connector = readelfStub();
    const attempt = introspect("/tmp/demo", "/usr/bin/demo", { timeout: -1 }, connector);
    await expect(attempt).rejects.toBeInstanceOf(IntrospectError);
    await expect(attempt).rejects.toMatchObject({ code: "INVALID_OPTIONS", category: "validation" });
    expect(connector.execute).not.toHaveBeenCalled();
  });
});
