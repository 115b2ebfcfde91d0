#!/usr/bin/env node
import fs from "node:fs";
import { fileURLToPath } from "node:url";

import { main } from "./src/index.js";

export { main };

function isDirectRun(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return fs.realpathSync(entry) === fs.realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

// Allow `node dist/index.js` and the npm bin symlink
if (isDirectRun()) {
  main(process.argv).catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
}
