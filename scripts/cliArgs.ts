/**
 * Argument parsing for the task-router CLI.
 */

import { parseTier } from "../src/tierPolicy.js";
import type { Tier } from "../src/types.js";

export type CliCommand = "init" | "run" | "classify" | "status" | "config" | "help";

export interface CliArgs {
  command: CliCommand;
  /** Positional words joined with spaces */
  text: string;
  tier?: Tier;
  dryRun: boolean;
  mock: boolean;
  json: boolean;
}

const COMMANDS: readonly CliCommand[] = ["init", "run", "classify", "status", "config", "help"];

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export function parseCliArgs(argv: string[]): CliArgs {
  const [first, ...rest] = argv;
  if (first == null || first === "--help" || first === "-h") {
    return { command: "help", text: "", dryRun: false, mock: false, json: false };
  }
  const command = COMMANDS.find((c) => c === first);
  if (!command) throw new CliUsageError(`Unknown command: ${first}`);

  const words: string[] = [];
  let tier: Tier | undefined;
  let dryRun = false;
  let mock = false;
  let json = false;

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === "--tier") {
      const value = rest[++i];
      if (value == null) throw new CliUsageError("--tier needs a value");
      tier = parseTier(value);
      if (!tier) throw new CliUsageError(`Unknown tier: ${value}`);
    } else if (arg === "--dry-run") {
      dryRun = true;
    } else if (arg === "--mock") {
      mock = true;
    } else if (arg === "--json") {
      json = true;
    } else if (arg.startsWith("--")) {
      throw new CliUsageError(`Unknown option: ${arg}`);
    } else {
      words.push(arg);
    }
  }

  const text = words.join(" ").trim();
  if ((command === "run" || command === "classify") && text === "") {
    throw new CliUsageError(`${command} needs a task description`);
  }
  return { command, text, tier, dryRun, mock, json };
}

export const USAGE = `Usage: task-router <command> [options]

Commands:
  init                      Create .task-router/ with default config and an empty ledger
  run <task...>             Classify, route and execute a task
  classify <task...>        Show the classification and routing for a task
  status                    Ledger statistics and savings
  config                    Print the effective configuration

Options:
  --tier <tier>             Force a tier (trivial|simple|standard|complex|critical)
  --dry-run                 With run: preview routing, persist nothing
  --mock                    Use mock workers instead of real backends
  --json                    Print JSON instead of a summary
`;
