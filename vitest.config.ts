import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    pool: "forks",
    // Grammar loading compiles a WASM module on first use
    testTimeout: 20_000,
    server: {
      deps: {
        // Inlining breaks the Emscripten module: Parser.Language stays unset after init()
        external: [/web-tree-sitter/],
      },
    },
  },
});
