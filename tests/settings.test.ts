import path from "path";
import { describe, expect, it } from "vitest";
import { loadSettings, resolveBasePath } from "../src/config/settings";

const dirs = { home: "/home/tester", temp: "/tmp/diag" };

describe("settings", () => {
  it("reads flags and the default output path from the environment", () => {
    const settings = loadSettings({
      DIAG_COLLECT_OUTPUT_PATH: "  /data/diag  ",
      DIAG_COLLECT_ARCHIVE: "TRUE",
      DIAG_COLLECT_QUIET: "0"
    });

    expect(settings).toEqual({ outputPath: "/data/diag", archive: true, quiet: false });
  });

  it("defaults everything off when nothing is set", () => {
    expect(loadSettings({})).toEqual({ outputPath: undefined, archive: false, quiet: false });
  });

  it("rejects a flag that is not a boolean", () => {
    expect(() => loadSettings({ DIAG_COLLECT_ARCHIVE: "sometimes" })).toThrow();
  });

  it("prefers --output-path, then --use-temp, then the configured path, then Documents", () => {
    const configured = { outputPath: "/data/diag", archive: false, quiet: false };
    const unset = { archive: false, quiet: false };

    expect(resolveBasePath({ outputPath: "/srv/out", useTemp: true }, configured, dirs)).toBe(path.resolve("/srv/out"));
    expect(resolveBasePath({ useTemp: true }, configured, dirs)).toBe("/tmp/diag");
    expect(resolveBasePath({}, configured, dirs)).toBe(path.resolve("/data/diag"));
    expect(resolveBasePath({}, unset, dirs)).toBe(path.join("/home/tester", "Documents"));
  });
});
