import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		include: ['nodes/**/*.test.ts', 'utils/**/*.test.ts'],
		testTimeout: 30_000,
	},
});
