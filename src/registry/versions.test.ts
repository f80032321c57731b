import { describe, it, expect } from "vitest";
import { isValidRange, selectVersion } from "./versions.js";

describe("selectVersion", () => {
  const available = ["1.0.0", "1.2.0", "1.10.0", "2.0.0", "2.1.0-beta.1"];

  it("picks the highest version by semver ordering", () => {
    expect(selectVersion(available, ["*"])).toBe("2.0.0");
    expect(selectVersion(available, ["^1.0.0"])).toBe("1.10.0");
  });

  it("intersects several ranges", () => {
    expect(selectVersion(available, [">=1.1.0", "<1.5.0"])).toBe("1.2.0");
    expect(selectVersion(available, ["^1.0.0", "^2.0.0"])).toBeNull();
  });

  it("honours a pinned version", () => {
    expect(selectVersion(available, ["*"], "1.2.0")).toBe("1.2.0");
    expect(selectVersion(available, ["^2.0.0"], "1.2.0")).toBeNull();
    expect(selectVersion(available, ["*"], "9.9.9")).toBeNull();
  });

  it("ignores entries that are not versions", () => {
    expect(selectVersion(["latest", "0.1.0"], ["*"])).toBe("0.1.0");
  });
});

describe("isValidRange", () => {
  it("accepts ranges and exact versions", () => {
    expect(isValidRange("^1.2.3")).toBe(true);
    expect(isValidRange("1.2.3")).toBe(true);
    expect(isValidRange("*")).toBe(true);
  });

  it("rejects garbage", () => {
    expect(isValidRange("not-a-range")).toBe(false);
  });
});
