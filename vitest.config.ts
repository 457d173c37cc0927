import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include:     ["supabase/functions/**/*.test.ts", "scripts/**/*.test.ts"],
    environment: "node",
    env:         { LOG_LEVEL: "error" },
  },
});
