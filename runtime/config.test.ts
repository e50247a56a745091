import { afterEach, describe, expect, it, vi } from "vitest";
import { ConfigurationError } from "../domain/errors.js";
import { loadFormatAttributes } from "./config.js";

describe("loadFormatAttributes", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("leaves unset variables absent", () => {
    const attributes = loadFormatAttributes({});
    expect(attributes.contains("pivotYear")).toBe(false);
    expect(attributes.get("pivotYear", 100)).toBe(100);
  });

  it("reads every known variable", () => {
    const attributes = loadFormatAttributes({
      CHRONO_PIVOT_YEAR: "2027",
      CHRONO_LENIENCY: "strict",
      CHRONO_ZERO_DIGIT: "٠",
      CHRONO_PROTECTED_CHARACTERS: " 2 ",
    });
    expect(attributes.get("pivotYear", 100)).toBe(2027);
    expect(attributes.get("leniency", "SMART")).toBe("STRICT");
    expect(attributes.get("zeroDigit", "0")).toBe("٠");
    expect(attributes.get("protectedCharacters", 0)).toBe(2);
  });

  it("rejects non-integer numbers", () => {
    expect(() => loadFormatAttributes({ CHRONO_PIVOT_YEAR: "soon" })).toThrow(
      "CHRONO_PIVOT_YEAR must be an integer"
    );
    expect(() => loadFormatAttributes({ CHRONO_PROTECTED_CHARACTERS: "" })).toThrow(
      ConfigurationError
    );
  });

  it("rejects unknown leniency modes", () => {
    expect(() => loadFormatAttributes({ CHRONO_LENIENCY: "loose" })).toThrow(ConfigurationError);
  });

  it("rejects zero digits longer than one character", () => {
    expect(() => loadFormatAttributes({ CHRONO_ZERO_DIGIT: "00" })).toThrow(ConfigurationError);
  });

  it("warns about unknown CHRONO_ variables only", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    loadFormatAttributes({ CHRONO_PIVOT: "2027", HOME: "/root" });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("Ignoring unknown format setting CHRONO_PIVOT");
  });
});
