import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["packages/*/src/**/__tests__/**/*.spec.{ts,tsx}"],
		environment: "node",
	},
});
