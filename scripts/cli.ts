#!/usr/bin/env node
/**
 * task-router CLI.
 *
 * Usage:
 *   task-router init
 *   task-router run "fix typo in README" [--tier simple] [--dry-run] [--mock]
 *   task-router classify "add OAuth login across multiple files"
 *   task-router status
 *   task-router config
 */

import { existsSync } from "fs";
import { getConfigPath, getDataDir } from "../src/config/env.js";
import { defaultConfigDocument, loadConfig, writeConfigFile } from "../src/config/loadConfig.js";
import { errorMessage } from "../src/errors.js";
import { createRuntime } from "../src/runtime.js";
import { fallbackBackendsFor, getTierConfig } from "../src/tierPolicy.js";
import { CliUsageError, USAGE, parseCliArgs } from "./cliArgs.js";
import type { CliArgs } from "./cliArgs.js";
import { formatClassification, formatRunResult, formatStats } from "./cliFormat.js";

function print(args: CliArgs, value: unknown, summary: string): void {
  console.log(args.json ? JSON.stringify(value, null, 2) : summary);
}

async function init(): Promise<number> {
  const dataDir = getDataDir();
  const configPath = getConfigPath(dataDir);
  if (existsSync(configPath)) {
    console.error(`${configPath} already exists; not overwriting.`);
    return 1;
  }
  await writeConfigFile(configPath, defaultConfigDocument());
  const runtime = await createRuntime({ dataDir });
  await runtime.close();
  console.log(`Initialized ${dataDir}`);
  console.log(`  config: ${configPath}`);
  return 0;
}

async function showConfig(args: CliArgs): Promise<number> {
  const loaded = await loadConfig();
  const redacted = {
    ...loaded.config,
    workers: {
      ...loaded.config.workers,
      anthropic: { ...loaded.config.workers.anthropic, apiKey: loaded.config.workers.anthropic.apiKey ? "(set)" : undefined },
      gemini: { ...loaded.config.workers.gemini, apiKey: loaded.config.workers.gemini.apiKey ? "(set)" : undefined },
    },
  };
  const source = loaded.fromFile ? loaded.path : `${loaded.path} (not found, defaults)`;
  print(args, redacted, `# ${source}\n${JSON.stringify(redacted, null, 2)}`);
  return 0;
}

async function main(argv: string[]): Promise<number> {
  const args = parseCliArgs(argv);
  switch (args.command) {
    case "help":
      console.log(USAGE);
      return 0;
    case "init":
      return init();
    case "config":
      return showConfig(args);
    default:
      break;
  }

  const runtime = await createRuntime({ mock: args.mock });
  try {
    const { conductor, ledger, policy } = runtime;
    if (args.command === "classify") {
      const c = conductor.classify(args.text, "");
      print(args, c, formatClassification(c, getTierConfig(policy, c.tier), fallbackBackendsFor(policy, c.tier)));
      return 0;
    }
    if (args.command === "status") {
      const stats = await ledger.getStats();
      print(args, stats, formatStats(stats));
      return 0;
    }

    if (args.dryRun) {
      const result = conductor.dryRun(args.text, "", { tier: args.tier });
      print(args, result, formatRunResult(result));
      return result.status === "failed" ? 1 : 0;
    }

    const controller = new AbortController();
    const onSigint = () => controller.abort();
    process.once("SIGINT", onSigint);
    try {
      const result = await conductor.run(args.text, "", { tier: args.tier, signal: controller.signal });
      print(args, result, formatRunResult(result));
      return result.status === "failed" ? 1 : 0;
    } finally {
      process.off("SIGINT", onSigint);
    }
  } finally {
    await runtime.close();
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    if (e instanceof CliUsageError) {
      console.error(`${e.message}\n\n${USAGE}`);
      process.exitCode = 2;
      return;
    }
    console.error(`task-router: ${errorMessage(e)}`);
    process.exitCode = 1;
  }
);
