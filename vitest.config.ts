import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    env: {
      NOTESYNC_CONFIG_PATH: "/nonexistent/notesync/config.json",
      NOTESYNC_LOG_LEVEL: "error",
    },
  },
});
