import { describe, expect, it } from "vitest";
import {
  describeInvalidKeyReason,
  getInvalidTranslationKeyReason,
} from "../src/translationKeys";

describe("getInvalidTranslationKeyReason", () => {
  it("accepts dotted keys with the allowed punctuation", () => {
    expect(getInvalidTranslationKeyReason("auth.login_form:title/short-1")).toBeNull();
  });

  it.each([
    ["", "empty"],
    ["x".repeat(161), "too_long"],
    [".auth", "boundary_dot"],
    ["auth..login", "consecutive_dots"],
    ["auth. .login", "empty_segment"],
    ["auth.log in", "unsupported_characters"],
    ["auth.__proto__", "reserved_segment"],
  ])("flags %j as %s", (key, reason) => {
    expect(getInvalidTranslationKeyReason(key)).toBe(reason);
  });

  it("describes a reason", () => {
    expect(describeInvalidKeyReason("consecutive_dots")).toBe(
      "Key cannot contain consecutive dots.",
    );
  });
});
