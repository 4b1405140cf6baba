import { describe, it, expect } from "vitest";
import { CliUsageError, parseCliArgs } from "../cliArgs.js";

describe("parseCliArgs", () => {
  it("shows help with no arguments", () => {
    expect(parseCliArgs([]).command).toBe("help");
    expect(parseCliArgs(["-h"]).command).toBe("help");
  });

  it("joins positional words into the task text", () => {
    expect(parseCliArgs(["run", "fix", "typo", "in", "README"])).toEqual({
      command: "run",
      text: "fix typo in README",
      tier: undefined,
      dryRun: false,
      mock: false,
      json: false,
    });
  });

  it("reads flags anywhere after the command", () => {
    const args = parseCliArgs(["run", "--dry-run", "add", "login", "--tier", "Complex", "--mock", "--json"]);
    expect(args.text).toBe("add login");
    expect(args.tier).toBe("complex");
    expect(args.dryRun).toBe(true);
    expect(args.mock).toBe(true);
    expect(args.json).toBe(true);
  });

  it("rejects bad input", () => {
    expect(() => parseCliArgs(["deploy"])).toThrow("Unknown command: deploy");
    expect(() => parseCliArgs(["run", "x", "--tier"])).toThrow("--tier needs a value");
    expect(() => parseCliArgs(["run", "x", "--tier", "huge"])).toThrow("Unknown tier: huge");
    expect(() => parseCliArgs(["status", "--verbose"])).toThrow("Unknown option: --verbose");
    expect(() => parseCliArgs(["classify"])).toThrow(CliUsageError);
    expect(() => parseCliArgs(["run", "  "])).toThrow("run needs a task description");
  });

  it("lets status and init run without text", () => {
    expect(parseCliArgs(["status", "--json"])).toMatchObject({ command: "status", text: "", json: true });
    expect(parseCliArgs(["init"]).command).toBe("init");
  });
});
