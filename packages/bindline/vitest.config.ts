import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        name: "bindline",
        include: ["src/**/*.spec.ts"],
        environment: "node",
        restoreMocks: true,
        coverage: {
            provider: "istanbul",
            include: ["src/**/*.ts"],
            exclude: ["src/**/*.spec.ts", "src/index.ts"],
        },
    },
});
