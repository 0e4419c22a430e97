import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["src/test/**/*.test.ts"],
        environment: "node",
        clearMocks: true,
        restoreMocks: true,
        hookTimeout: 30000
    }
});
