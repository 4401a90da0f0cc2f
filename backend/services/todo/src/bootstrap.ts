// backend/services/todo/src/bootstrap.ts
/**
 * Side-effect module: load .env files before anything reads process.env.
 * Import FIRST in the entrypoint.
 */

import { loadEnvFiles } from "@shared/env/EnvLoader";

const loaded = loadEnvFiles();

if (loaded.length > 0) {
  console.log(
    `[bootstrap] env files: ${loaded
      .map((s) => `${s.file}:${s.newKeys}+${s.overrides}/${s.totalKeys}`)
      .join(" ")}`
  );
}
