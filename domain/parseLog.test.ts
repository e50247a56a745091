import { describe, expect, it } from "vitest";
import { ConfigurationError } from "./errors.js";
import { ParseLog } from "./parseLog.js";

describe("ParseLog", () => {
  it("starts clean", () => {
    const log = new ParseLog();
    expect(log.position).toBe(0);
    expect(log.isError()).toBe(false);
    expect(log.isWarning()).toBe(false);
    expect(log.errorPosition).toBe(-1);
  });

  it("setError keeps the position", () => {
    const log = new ParseLog(4);
    log.setError(6, "Digit expected.");
    expect(log.position).toBe(4);
    expect(log.errorPosition).toBe(6);
    expect(log.message).toBe("Digit expected.");
    expect(log.toString()).toBe(
      '[position=4, error-index=6, error-message="Digit expected.", warning=false]'
    );
  });

  it("clearError resets error and warning", () => {
    const log = new ParseLog();
    log.setError(0, "Missing digits for: YEAR");
    log.setWarning();
    log.clearError();
    expect(log.isError()).toBe(false);
    expect(log.isWarning()).toBe(false);
    expect(log.message).toBe("");
  });

  it("rejects negative positions", () => {
    expect(() => new ParseLog(-1)).toThrow(ConfigurationError);
    expect(() => new ParseLog().setPosition(-2)).toThrow("Undefined parse position");
  });
});
