import type * as fsType from "fs";

import { ConfigError } from "../src/errors.js";
import {
  CONFIG_JSON_FILEPATH,
  CONFIG_YAML_FILEPATH,
  DEFAULT_CONFIG,
  loadConfig,
  toTextAreaOptions,
} from "../src/utils/config.js";
import { tmpdir } from "os";
import { join } from "path";
import { test, expect, beforeEach, vi } from "vitest";

// In‑memory FS store
let memfs: Record<string, string> = {};

// Mock out the parts of "fs" that the config module uses.
vi.mock("fs", async () => {
  const real = await vi.importActual<typeof fsType>("fs");
  return {
    ...real,
    existsSync: (path: string) => memfs[path] !== undefined,
    readFileSync: (path: string) => {
      const data = memfs[path];
      if (data === undefined) {
        throw new Error("ENOENT");
      }
      return data;
    },
  };
});

let testDir: string;

beforeEach(() => {
  memfs = {};
  testDir = tmpdir();
});

test("returns the defaults when no config file exists", () => {
  expect(loadConfig()).toEqual({ tab: "    " });
  expect(loadConfig(join(testDir, "missing.json"))).toEqual(DEFAULT_CONFIG);
});

test("loads a JSON config from an explicit path", () => {
  const path = join(testDir, "config.json");
  memfs[path] = JSON.stringify({ tab: "  ", borderStyle: "round" });
  expect(loadConfig(path)).toEqual({ tab: "  ", borderStyle: "round" });
});

test("loads a YAML config", () => {
  const path = join(testDir, "config.yaml");
  memfs[path] = "tab: '  '\ncolor: green\nbackgroundColor: black\n";
  expect(loadConfig(path)).toEqual({
    tab: "  ",
    color: "green",
    backgroundColor: "black",
  });
});

test("treats an empty YAML file as an empty config", () => {
  const path = join(testDir, "config.yml");
  memfs[path] = "";
  expect(loadConfig(path)).toEqual({ tab: "    " });
});

test("prefers config.json over config.yaml in the config dir", () => {
  memfs[CONFIG_JSON_FILEPATH] = JSON.stringify({ tab: "      " });
  memfs[CONFIG_YAML_FILEPATH] = "tab: ''\n";
  expect(loadConfig().tab).toBe("      ");

  delete memfs[CONFIG_JSON_FILEPATH];
  expect(loadConfig().tab).toBe("");
});

test("rejects a tab containing non-space characters", () => {
  const path = join(testDir, "config.json");
  memfs[path] = JSON.stringify({ tab: "\t" });
  expect(() => loadConfig(path)).toThrow(ConfigError);
  expect(() => loadConfig(path)).toThrow(
    'tab string must consist of spaces but got "\\t"',
  );
});

test("rejects unknown keys and bad border styles", () => {
  const path = join(testDir, "config.json");
  memfs[path] = JSON.stringify({ tabs: "  " });
  expect(() => loadConfig(path)).toThrow(/invalid config file/);

  memfs[path] = JSON.stringify({ borderStyle: "wavy" });
  expect(() => loadConfig(path)).toThrow(/borderStyle/);
});

test("reports unparsable files as ConfigError", () => {
  const path = join(testDir, "config.json");
  memfs[path] = "{ not json";
  expect(() => loadConfig(path)).toThrow(ConfigError);
  expect(() => loadConfig(path)).toThrow(/failed to parse config file/);
});

test("toTextAreaOptions maps colours to style and border to block", () => {
  expect(
    toTextAreaOptions({
      tab: "  ",
      borderStyle: "double",
      borderColor: "cyan",
      color: "green",
    }),
  ).toEqual({
    tab: "  ",
    style: { color: "green" },
    block: { borderStyle: "double", borderColor: "cyan" },
  });

  expect(toTextAreaOptions({ tab: "    ", color: "red" })).toEqual({
    tab: "    ",
    style: { color: "red" },
    block: undefined,
  });
});
