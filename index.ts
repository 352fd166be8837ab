#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";

import { main } from "./src/index.js";

export { main };
export * from "./src/api.js";

// Allow `node dist/index.js` and the npm bin link to run the CLI directly
const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
  void main(process.argv);
}
