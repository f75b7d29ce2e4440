#!/usr/bin/env node
import type { AppConfig, BorderStyleName } from "./utils/config.js";

import App from "./app.js";
import { TextAreaError } from "./errors.js";
import { assertTabString } from "./text-area.js";
import {
  BORDER_STYLES,
  loadConfig,
  toTextAreaOptions,
} from "./utils/config.js";
import chalk from "chalk";
import { render } from "ink";
import meow from "meow";
import React from "react";

const cli = meow(
  `
  Usage
    $ tty-textarea [text]

  Options
    --tab <spaces>      Indentation inserted by <Tab> (spaces only)
    --border <style>    Frame style: ${BORDER_STYLES.join(", ")}
    --config <path>     Read settings from this JSON or YAML file
    -h, --help          Show this help and exit
    --version           Print version and exit

  Keys
    Ctrl+A / Ctrl+E     Start / end of line
    Ctrl+F / Ctrl+B     Forward / back one character
    Ctrl+N / Ctrl+P     Next / previous line
    Ctrl+H              Delete the character before the cursor
    Esc                 Finish and print the text
`,
  {
    importMeta: import.meta,
    autoHelp: true,
    flags: {
      help: { type: "boolean", aliases: ["h"] },
      version: { type: "boolean" },
      tab: { type: "string" },
      border: { type: "string" },
      config: { type: "string" },
    },
  },
);

function isBorderStyle(value: string): value is BorderStyleName {
  const styles: ReadonlyArray<string> = BORDER_STYLES;
  return styles.includes(value);
}

function fail(message: string): never {
  // eslint-disable-next-line no-console
  console.error(chalk.red(`tty-textarea: ${message}`));
  process.exit(1);
}

function resolveConfig(): AppConfig {
  let config: AppConfig;
  try {
    config = loadConfig(cli.flags.config);
  } catch (err) {
    if (err instanceof TextAreaError) {
      fail(err.message);
    }
    throw err;
  }

  const { tab, border } = cli.flags;
  if (tab !== undefined) {
    try {
      assertTabString(tab);
    } catch (err) {
      if (err instanceof TextAreaError) {
        fail(err.message);
      }
      throw err;
    }
    config = { ...config, tab };
  }
  if (border !== undefined) {
    if (!isBorderStyle(border)) {
      fail(
        `unknown border style ${JSON.stringify(border)}; expected one of ${BORDER_STYLES.join(", ")}`,
      );
    }
    config = { ...config, borderStyle: border };
  }
  return config;
}

const config = resolveConfig();
const options = toTextAreaOptions(config);
let finalText = "";

const { waitUntilExit } = render(
  <App
    initialText={cli.input.join(" ")}
    tab={config.tab}
    style={options.style}
    block={options.block}
    onDone={(text) => {
      finalText = text;
    }}
  />,
);

await waitUntilExit();
process.stdout.write(finalText + "\n");
