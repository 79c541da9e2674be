import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts", cli: "src/cli.ts" },
  format:   ["esm", "cjs"],
  dts:      { entry: { index: "src/index.ts" } },
  clean:    true,
  // terminal.ts needs node:readline; session.ts needs Buffer for base64.
  platform: "node",
  target:   "node20",
});
