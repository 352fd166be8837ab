import { configureModule } from "../app/configure-module.js";
import type { ProjectConfig } from "../core/config.js";
import type { LogSink } from "../core/logger.js";
import { writeGeneratorFiles, type GeneratorFiles } from "../generator/generator-config.js";

export async function configureCommand(config: ProjectConfig, log: LogSink): Promise<GeneratorFiles> {
  const configured = await configureModule({ config, log });

  if (configured.adapter.status === "skipped") {
    console.log(`Language adapter skipped for ${configured.model.path} (${configured.adapter.reason}).`);
  }

  const files = await writeGeneratorFiles(configured.docs);
  const visible = files.configuration.sourceSets.filter((sourceSet) => !sourceSet.suppress);

  console.log(
    `Configured ${files.configuration.sourceSets.length} source set(s), ${visible.length} documented.`,
  );
  console.log(`Generator configuration: ${files.configPath}`);
  for (const file of files.parameterFiles) {
    console.log(`Plugin parameters: ${file}`);
  }

  return files;
}
