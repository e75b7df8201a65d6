import { describe, it, expect } from "vitest";
import { InvalidSignatureError, PreconditionViolation, PreprocessorError, assertPrecondition } from "../errors.ts";
import { formatLocation, nonOptionalLocation } from "../utils/location.ts";
import { loc } from "../test-utils/fixtures.ts";

describe("formatLocation", () => {
  it("renders file, line and column", () => {
    expect(formatLocation(loc(12, 4))).toBe("account.cairo:12:4");
  });

  it("omits a missing file", () => {
    expect(formatLocation({ startLine: 3, startCol: 8 })).toBe("3:8");
  });
});

describe("nonOptionalLocation", () => {
  it("returns a present location", () => {
    expect(nonOptionalLocation(loc(1))).toEqual(loc(1));
  });

  it("throws a precondition violation when absent", () => {
    expect(() => nonOptionalLocation(undefined)).toThrow(PreconditionViolation);
  });
});

describe("assertPrecondition", () => {
  it("passes on a true condition", () => {
    expect(() => assertPrecondition(true, "unused")).not.toThrow();
  });

  it("throws a named internal error", () => {
    expect(() => assertPrecondition(false, "broken")).toThrow(new PreconditionViolation("broken"));
  });
});

describe("PreprocessorError", () => {
  it("serializes code and location", () => {
    const err = new InvalidSignatureError("Constructors must have no return values.", loc(2, 5));

    expect(err).toBeInstanceOf(PreprocessorError);
    expect(err.name).toBe("InvalidSignatureError");
    expect(err.toJSON()).toEqual({
      name: "InvalidSignatureError",
      message: "account.cairo:2:5: Constructors must have no return values.",
      shortMessage: "account.cairo:2:5: Constructors must have no return values.",
      details: undefined,
      cause: undefined,
      code: "INVALID_SIGNATURE",
      location: loc(2, 5),
    });
  });

  it("appends details to the message", () => {
    const err = new PreprocessorError("ABI_FORMAT", "Invalid contract ABI.", { details: "  - 0.type: bad" });
    expect(err.message).toBe("Invalid contract ABI.\n  - 0.type: bad");
    expect(err.shortMessage).toBe("Invalid contract ABI.");
  });
});
