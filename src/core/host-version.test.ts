import { describe, expect, it } from "vitest";

import { ModelError } from "./errors.js";
import { compareVersions, detectHostCapabilities, isAtLeast, parseVersion } from "./host-version.js";

describe("compareVersions", () => {
  it("compares numeric segments", () => {
    expect(compareVersions("8.10", "8.2")).toBe(1);
    expect(compareVersions("8.2", "8.2.0")).toBe(0);
    expect(compareVersions("7.6.3", "8.0")).toBe(-1);
  });

  it("orders pre-releases before the release", () => {
    expect(compareVersions("8.2-rc-1", "8.2")).toBe(-1);
    expect(isAtLeast("8.2-rc-1", "8.2")).toBe(false);
    expect(isAtLeast("8.2.1", "8.2")).toBe(true);
  });

  it("rejects malformed versions", () => {
    expect(() => parseVersion("eight")).toThrow(ModelError);
  });
});

describe("detectHostCapabilities", () => {
  it("gates the declared flag on the host version", () => {
    expect(detectHostCapabilities({ hostVersion: "8.1" }).bucketDeclaredFlag).toBe("unavailable");
    expect(detectHostCapabilities({ hostVersion: "8.2" }).bucketDeclaredFlag).toBe("available");
  });

  it("gates compilation variants on the language plugin version", () => {
    expect(
      detectHostCapabilities({ hostVersion: "8.5", languagePluginVersion: "1.3.72" })
        .compilationVariants,
    ).toBe("unavailable");
    expect(
      detectHostCapabilities({ hostVersion: "8.5", languagePluginVersion: "1.9.20" })
        .compilationVariants,
    ).toBe("available");
    expect(detectHostCapabilities({ hostVersion: "8.5" }).compilationVariants).toBe("available");
  });

  it("returns the cached answer for the same versions", () => {
    const first = detectHostCapabilities({ hostVersion: "8.4", languagePluginVersion: "2.0.0" });
    const second = detectHostCapabilities({ hostVersion: "8.4", languagePluginVersion: "2.0.0" });
    expect(second).toBe(first);
  });
});
