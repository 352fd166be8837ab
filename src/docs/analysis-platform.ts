import { ModelError } from "../core/errors.js";

export const ANALYSIS_PLATFORMS = ["jvm", "js", "wasm", "native", "common"] as const;

export type AnalysisPlatform = (typeof ANALYSIS_PLATFORMS)[number];

/** Maps a language platform name (case-insensitive) to the generator's analysis platform. */
export function analysisPlatformFromString(key: string): AnalysisPlatform {
  switch (key.toLowerCase()) {
    case "common":
    case "metadata":
      return "common";
    case "js":
      return "js";
    case "jvm":
    case "androidjvm":
    case "android":
      return "jvm";
    case "native":
      return "native";
    case "wasm":
      return "wasm";
    default:
      throw new ModelError(`Unrecognized platform: ${key}`);
  }
}
