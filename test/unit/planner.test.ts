import { describe, it, expect } from "vitest";
import { isExecutionMode, parseExecutionMode, plan } from "../../src/strategy/planner.js";
import { ConfigurationError } from "../../src/errors.js";

describe("plan", () => {
  describe("single_pass", () => {
    it.each(["READ", "WRITE", "GENERAL"] as const)("runs %s in one unstreamed pass with tools", (op) => {
      expect(plan(op, "single_pass", true)).toEqual({
        operationType: op,
        mode: "single_pass",
        passCount: 1,
        streamFirstPass: false,
        toolsEnabledInPass: [true],
      });
    });
  });

  describe("dual_pass_write_only", () => {
    it("runs READ like single_pass", () => {
      const result = plan("READ", "dual_pass_write_only", true);
      expect(result.passCount).toBe(1);
      expect(result.streamFirstPass).toBe(false);
      expect(result.toolsEnabledInPass).toEqual([true]);
    });

    it("splits WRITE into a streamed acknowledgment and a tool pass", () => {
      const result = plan("WRITE", "dual_pass_write_only", true);
      expect(result.passCount).toBe(2);
      expect(result.streamFirstPass).toBe(true);
      expect(result.toolsEnabledInPass).toEqual([false, true]);
      expect(result.hazard).toBeUndefined();
    });

    it("streams GENERAL without tools", () => {
      const result = plan("GENERAL", "dual_pass_write_only", true);
      expect(result.passCount).toBe(1);
      expect(result.streamFirstPass).toBe(true);
      expect(result.toolsEnabledInPass).toEqual([false]);
    });
  });

  describe("dual_pass_all", () => {
    it.each(["WRITE", "GENERAL"] as const)("splits %s into two passes", (op) => {
      const result = plan(op, "dual_pass_all", true);
      expect(result.passCount).toBe(2);
      expect(result.toolsEnabledInPass).toEqual([false, true]);
      expect(result.hazard).toBeUndefined();
    });

    it("flags READ because the visible answer has no tool access", () => {
      const result = plan("READ", "dual_pass_all", true);
      expect(result.passCount).toBe(2);
      expect(result.hazard).toBe("unverified-read-answer");
    });
  });

  it.each(["single_pass", "dual_pass_write_only", "dual_pass_all"])(
    "falls back to one streamed pass without tools when none are enabled (%s)",
    (mode) => {
      const result = plan("WRITE", mode, false);
      expect(result.passCount).toBe(1);
      expect(result.streamFirstPass).toBe(true);
      expect(result.toolsEnabledInPass).toEqual([false]);
      expect(result.hazard).toBeUndefined();
    },
  );

  it("rejects unknown modes with a ConfigurationError", () => {
    expect(() => plan("READ", "triple_pass", true)).toThrow(ConfigurationError);
    expect(() => plan("READ", "triple_pass", true)).toThrow(
      'Invalid execution mode "triple_pass": expected one of single_pass, dual_pass_write_only, dual_pass_all',
    );
  });
});

describe("execution modes", () => {
  it("recognizes the three modes", () => {
    expect(isExecutionMode("dual_pass_all")).toBe(true);
    expect(isExecutionMode("DUAL_PASS_ALL")).toBe(false);
  });

  it("parses a valid mode unchanged", () => {
    expect(parseExecutionMode("single_pass")).toBe("single_pass");
  });
});
