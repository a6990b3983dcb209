import { describe, expect, it } from "vitest";
import { isCacheValid } from "../src/runtime/cacheGate";

const descriptor = { url: "https://x/runtime.jar", expectedFingerprint: "abc" };

describe("isCacheValid", () => {
  it.each([
    { cached: "abc", exists: true, expected: true },
    { cached: "abc", exists: false, expected: false },
    { cached: "def", exists: true, expected: false },
    { cached: "def", exists: false, expected: false }
  ])("cached=$cached exists=$exists -> $expected", ({ cached, exists, expected }) => {
    expect(isCacheValid(descriptor, cached, exists)).toBe(expected);
  });

  it("never matches the empty default", () => {
    expect(isCacheValid(descriptor, "", true)).toBe(false);
  });
});
