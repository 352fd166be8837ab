/*
Purpose: compare host-platform versions and probe which host APIs exist.
Assumptions: versions look like "8.2", "8.10.2" or "8.2-rc-1"; pre-releases sort before the release.
Usage: detectHostCapabilities({ hostVersion: "8.5", languagePluginVersion: "1.9.20" }).
*/

import { ModelError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type CapabilityState = "available" | "unavailable";

/** Result of probing a host API: it answered yes, it answered no, or it does not exist. */
export type ProbeResult = "yes" | "no" | "unavailable";

export type HostCapabilities = {
  /** Dependency buckets accept the explicit can-be-declared flag. */
  bucketDeclaredFlag: CapabilityState;
  /** Compilations expose the variant kind they were created for. */
  compilationVariants: CapabilityState;
};

export type HostVersions = {
  hostVersion: string;
  languagePluginVersion?: string;
};

type ParsedVersion = {
  segments: number[];
  prerelease: boolean;
};

export const MIN_BUCKET_DECLARED_FLAG_VERSION = "8.2";
export const MIN_COMPILATION_VARIANTS_VERSION = "1.4";

// =============================================================================
// VERSION COMPARISON
// =============================================================================

export function parseVersion(version: string): ParsedVersion {
  const trimmed = version.trim();
  const [base, ...rest] = trimmed.split("-");
  const segments = (base ?? "").split(".").map((part) => Number.parseInt(part, 10));
  if (segments.length === 0 || segments.some((segment) => Number.isNaN(segment))) {
    throw new ModelError(`Invalid version '${version}'.`);
  }
  return { segments, prerelease: rest.length > 0 };
}

export function compareVersions(left: string, right: string): number {
  const a = parseVersion(left);
  const b = parseVersion(right);
  const length = Math.max(a.segments.length, b.segments.length);

  for (let i = 0; i < length; i += 1) {
    const diff = (a.segments[i] ?? 0) - (b.segments[i] ?? 0);
    if (diff !== 0) return Math.sign(diff);
  }

  if (a.prerelease === b.prerelease) return 0;
  return a.prerelease ? -1 : 1;
}

export function isAtLeast(version: string, minimum: string): boolean {
  return compareVersions(version, minimum) >= 0;
}

// =============================================================================
// CAPABILITY PROBING
// =============================================================================

const capabilityCache = new Map<string, HostCapabilities>();

/** Evaluated once per version pair; later calls return the cached answer. */
export function detectHostCapabilities(versions: HostVersions): HostCapabilities {
  const key = `${versions.hostVersion}|${versions.languagePluginVersion ?? ""}`;
  const cached = capabilityCache.get(key);
  if (cached) return cached;

  const capabilities: HostCapabilities = {
    bucketDeclaredFlag: isAtLeast(versions.hostVersion, MIN_BUCKET_DECLARED_FLAG_VERSION)
      ? "available"
      : "unavailable",
    // An unknown plugin version is assumed current.
    compilationVariants:
      versions.languagePluginVersion === undefined ||
      isAtLeast(versions.languagePluginVersion, MIN_COMPILATION_VARIANTS_VERSION)
        ? "available"
        : "unavailable",
  };

  capabilityCache.set(key, capabilities);
  return capabilities;
}
