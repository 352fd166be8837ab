import { describe, expect, it } from "vitest";

import { DocSourceSet } from "../docs/doc-source-set.js";

import { formatSourceSetSummary, summarizeSourceSet } from "./inspect.js";

describe("inspect output", () => {
  it("summarizes a doc source set", () => {
    const sourceSet = new DocSourceSet("jvmTest", "/work");
    sourceSet.suppress.set(true);
    sourceSet.displayName.set("jvm");
    sourceSet.sourceRoots.from("src/jvmTest/kotlin");
    sourceSet.classpath.from(["/libs/a.jar", "/libs/b.jar"]);
    sourceSet.dependentSourceSets.register("jvmMain0", (ref) => {
      ref.sourceSetName = "jvmMain";
    });

    const summary = summarizeSourceSet(sourceSet);

    expect(summary).toEqual({
      name: "jvmTest",
      displayName: "jvm",
      suppress: true,
      platform: "common",
      sourceRoots: ["/work/src/jvmTest/kotlin"],
      classpathSize: 2,
      dependsOn: ["jvmMain"],
    });
    expect(formatSourceSetSummary(summary)).toEqual([
      "- jvmTest (jvm, common, suppressed)",
      "    depends on: jvmMain",
      "    root: /work/src/jvmTest/kotlin",
      "    classpath: 2 file(s)",
    ]);
  });

  it("omits dependencies and roots when there are none", () => {
    const summary = summarizeSourceSet(new DocSourceSet("commonMain", "/work"));

    expect(formatSourceSetSummary(summary)).toEqual([
      "- commonMain (commonMain, common, documented)",
      "    classpath: 0 file(s)",
    ]);
  });
});
