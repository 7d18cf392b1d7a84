import path from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
    esbuild: {
        jsx: "automatic",
    },
    test: {
        setupFiles: ["tests/setup/env.ts"],
        globals: true,
        environment: "node",
        environmentMatchGlobs: [["tests/components/**", "happy-dom"]],
        include: ["tests/**/*.test.ts", "tests/**/*.test.tsx"],
        alias: {
            "@": path.resolve(__dirname, "src"),
        },
    },
});
