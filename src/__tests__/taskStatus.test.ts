import { describe, it, expect } from "vitest";
import { canTransition, isTerminal } from "../taskStatus.js";

describe("task status transitions", () => {
  it("allows the forward moves of a run", () => {
    expect(canTransition("pending", "working")).toBe(true);
    expect(canTransition("working", "validating")).toBe(true);
    expect(canTransition("working", "done")).toBe(true);
    expect(canTransition("validating", "approved")).toBe(true);
    expect(canTransition("approved", "done")).toBe(true);
    expect(canTransition("rejected", "failed")).toBe(true);
  });

  it("allows re-asserting the current status", () => {
    expect(canTransition("working", "working")).toBe(true);
    expect(canTransition("done", "done")).toBe(true);
  });

  it("rejects moving backwards or out of a terminal status", () => {
    expect(canTransition("working", "pending")).toBe(false);
    expect(canTransition("done", "working")).toBe(false);
    expect(canTransition("failed", "pending")).toBe(false);
    expect(canTransition("pending", "done")).toBe(false);
    expect(canTransition("rejected", "done")).toBe(false);
  });

  it("treats done and failed as terminal", () => {
    expect(isTerminal("done")).toBe(true);
    expect(isTerminal("failed")).toBe(true);
    expect(isTerminal("validating")).toBe(false);
  });
});
