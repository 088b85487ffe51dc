import { describe, expect, it } from "vitest";

import { checkPassword, resetLinkWaitSeconds, validateNewPassword } from "../src/password";

describe("checkPassword", () => {
  it("accepts a password with every character class inside the length bounds", () => {
    expect(checkPassword("Abcdef1!")).toBe("Strong");
  });

  it("checks length before character classes", () => {
    expect(checkPassword("abc")).toBe("TooShort");
    expect(checkPassword("a".repeat(33))).toBe("TooLong");
  });

  it("reports the first missing class", () => {
    expect(checkPassword("abcdefg1!")).toBe("MissingUppercase");
    expect(checkPassword("ABCDEFG1!")).toBe("MissingLowercase");
    expect(checkPassword("Abcdefgh!")).toBe("MissingNumber");
    expect(checkPassword("Abcdefg12")).toBe("MissingSpecialChar");
  });

  it("accepts exactly the bounds", () => {
    expect(checkPassword("Abcde1!x")).toBe("Strong");
    expect(checkPassword("Abcde1!" + "x".repeat(25))).toBe("Strong");
    expect(checkPassword("Abcde1!" + "x".repeat(26))).toBe("TooLong");
  });

  it("honours a custom policy", () => {
    expect(checkPassword("Ab1!", { minLength: 4, maxLength: 6 })).toBe("Strong");
  });
});

describe("validateNewPassword", () => {
  it("rejects empty and mismatched input before the policy", () => {
    expect(validateNewPassword("", "")).toEqual({ ok: false, message: "Password cannot be empty" });
    expect(validateNewPassword("Abcdef1!", "Abcdef1?")).toEqual({ ok: false, message: "Passwords do not match" });
  });

  it("reports a short password", () => {
    expect(validateNewPassword("abc", "abc")).toEqual({
      ok: false,
      message: "Password must be at least 8 characters long",
    });
  });

  it("accepts a strong matching password", () => {
    expect(validateNewPassword("Abcdef1!", "Abcdef1!")).toEqual({ ok: true });
  });
});

describe("resetLinkWaitSeconds", () => {
  it("allows the first request and waits out the cooldown", () => {
    expect(resetLinkWaitSeconds(undefined, 1_000)).toBe(0);
    expect(resetLinkWaitSeconds(0, 30_500)).toBe(30);
    expect(resetLinkWaitSeconds(0, 60_000)).toBe(0);
  });
});
