import { describe, it, expect } from "vitest";
import { describeFatal } from "./fatal.js";

describe("describeFatal", () => {
  it("prints the stack of an Error", () => {
    const cause = new Error("git exploded");
    expect(describeFatal(cause)).toBe(cause.stack);
  });

  it("falls back to the message when an Error has no stack", () => {
    const cause = new Error("git exploded");
    delete cause.stack;
    expect(describeFatal(cause)).toBe("git exploded");
  });

  it("stringifies anything else", () => {
    expect(describeFatal("plain failure")).toBe("plain failure");
    expect(describeFatal(42)).toBe("42");
  });
});
