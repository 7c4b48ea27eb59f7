import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const root = fileURLToPath(new URL(".", import.meta.url));

export default defineConfig({
  test: {
    root,
    include: ["tests/**/*.spec.ts"],
    environment: "node",
    globals: false,
    env: {
      ESTIMATE_PILOT_HOME: join(tmpdir(), "estimate-pilot-vitest"),
      LOG_LEVEL: "silent"
    }
  }
});
