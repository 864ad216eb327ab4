#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { main } from "./src/index.js";

export { main };

function isDirectExecution(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  // npm installs bins as symlinks, so compare against the resolved target.
  return import.meta.url === pathToFileURL(fs.realpathSync(script)).href;
}

// Allow `node dist/index.js` and the installed bin to run the CLI
if (isDirectExecution()) {
  main(process.argv).catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
}
