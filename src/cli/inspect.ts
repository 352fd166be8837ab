import { configureModule } from "../app/configure-module.js";
import type { ProjectConfig } from "../core/config.js";
import type { LogSink } from "../core/logger.js";
import type { DocSourceSet } from "../docs/doc-source-set.js";

export type SourceSetSummary = {
  name: string;
  displayName: string;
  suppress: boolean;
  platform: string;
  sourceRoots: string[];
  classpathSize: number;
  dependsOn: string[];
};

export function summarizeSourceSet(sourceSet: DocSourceSet): SourceSetSummary {
  return {
    name: sourceSet.name,
    displayName: sourceSet.displayName.get(),
    suppress: sourceSet.suppress.get(),
    platform: sourceSet.analysisPlatform.get(),
    sourceRoots: sourceSet.sourceRoots.files(),
    classpathSize: sourceSet.classpath.files().length,
    dependsOn: sourceSet.dependentSourceSetNames(),
  };
}

export function formatSourceSetSummary(summary: SourceSetSummary): string[] {
  const state = summary.suppress ? "suppressed" : "documented";
  const lines = [`- ${summary.name} (${summary.displayName}, ${summary.platform}, ${state})`];
  if (summary.dependsOn.length > 0) {
    lines.push(`    depends on: ${summary.dependsOn.join(", ")}`);
  }
  for (const root of summary.sourceRoots) {
    lines.push(`    root: ${root}`);
  }
  lines.push(`    classpath: ${summary.classpathSize} file(s)`);
  return lines;
}

export async function inspectCommand(
  config: ProjectConfig,
  log: LogSink,
  opts: { json?: boolean } = {},
): Promise<SourceSetSummary[]> {
  const { docs, model } = await configureModule({ config, log });
  const summaries = docs.docSourceSets.values().map(summarizeSourceSet);

  if (opts.json) {
    console.log(JSON.stringify(summaries, null, 2));
    return summaries;
  }

  console.log(`Module ${model.path}: ${summaries.length} source set(s)`);
  for (const summary of summaries) {
    for (const line of formatSourceSetSummary(summary)) {
      console.log(line);
    }
  }
  return summaries;
}
