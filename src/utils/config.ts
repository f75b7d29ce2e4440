import type { TextAreaOptions } from "../text-area.js";
import type { Block, TextStyle } from "../widget.js";

import { ConfigError } from "../errors.js";
import { DEFAULT_TAB, assertTabString } from "../text-area.js";
import { log } from "./logger/log.js";
import { existsSync, readFileSync } from "fs";
import { load as loadYaml } from "js-yaml";
import { homedir } from "os";
import { extname, join } from "path";
import { z } from "zod";

export const CONFIG_DIR = join(homedir(), ".tty-textarea");
export const CONFIG_JSON_FILEPATH = join(CONFIG_DIR, "config.json");
export const CONFIG_YAML_FILEPATH = join(CONFIG_DIR, "config.yaml");
export const CONFIG_YML_FILEPATH = join(CONFIG_DIR, "config.yml");

export const BORDER_STYLES = [
  "single",
  "double",
  "round",
  "bold",
  "singleDouble",
  "doubleSingle",
  "classic",
] as const;

export type BorderStyleName = (typeof BORDER_STYLES)[number];

const StoredConfigSchema = z
  .object({
    tab: z.string().optional(),
    borderStyle: z.enum(BORDER_STYLES).optional(),
    borderColor: z.string().optional(),
    color: z.string().optional(),
    backgroundColor: z.string().optional(),
  })
  .strict();

// Represents config as persisted in config.json / config.yaml.
export type StoredConfig = z.infer<typeof StoredConfigSchema>;

// Represents full runtime config with defaults applied.
export type AppConfig = {
  tab: string;
  borderStyle?: BorderStyleName;
  borderColor?: string;
  color?: string;
  backgroundColor?: string;
};

export const DEFAULT_CONFIG: AppConfig = { tab: DEFAULT_TAB };

function parseConfigFile(filePath: string): unknown {
  const raw = readFileSync(filePath, "utf-8");
  const ext = extname(filePath).toLowerCase();
  try {
    if (ext === ".yaml" || ext === ".yml") {
      return loadYaml(raw) ?? {};
    }
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(
      `failed to parse config file ${filePath}: ${
        err instanceof Error ? err.message : String(err)
      }`,
    );
  }
}

function findDefaultConfigPath(): string | undefined {
  return [CONFIG_JSON_FILEPATH, CONFIG_YAML_FILEPATH, CONFIG_YML_FILEPATH].find(
    (p) => existsSync(p),
  );
}

/**
 * Load the stored config. With no explicit path the first of
 * `~/.tty-textarea/config.{json,yaml,yml}` that exists wins; a missing file
 * yields {@link DEFAULT_CONFIG}. Invalid contents throw a {@link ConfigError}.
 */
export function loadConfig(configPath?: string): AppConfig {
  const filePath = configPath ?? findDefaultConfigPath();
  if (filePath === undefined || !existsSync(filePath)) {
    log(`config: no config file found, using defaults`);
    return { ...DEFAULT_CONFIG };
  }

  const parsed = StoredConfigSchema.safeParse(parseConfigFile(filePath));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`invalid config file ${filePath}: ${issues}`);
  }

  const stored: StoredConfig = parsed.data;
  const tab = stored.tab ?? DEFAULT_TAB;
  assertTabString(tab);

  log(`config: loaded ${filePath}`);
  return {
    tab,
    borderStyle: stored.borderStyle,
    borderColor: stored.borderColor,
    color: stored.color,
    backgroundColor: stored.backgroundColor,
  };
}

/** Translate the runtime config into {@link TextAreaOptions}. */
export function toTextAreaOptions(config: AppConfig): TextAreaOptions {
  const style: TextStyle = {
    color: config.color,
    backgroundColor: config.backgroundColor,
  };
  const block: Block | undefined =
    config.borderStyle === undefined
      ? undefined
      : { borderStyle: config.borderStyle, borderColor: config.borderColor };

  return { tab: config.tab, style, block };
}
