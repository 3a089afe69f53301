import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        globals: true,
        environment: "node",
        include: ["tests/**/*.test.ts"],
        globalSetup: "./tests/global-setup.ts",
        // Lock tests share the module-level observer
        fileParallelism: false,
        sequence: {
            concurrent: false,
        },
    },
});
