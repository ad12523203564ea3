import {defineConfig} from 'vitest/config';

export default defineConfig({
	test: {
		include: ['source/**/*.test.ts'],
		exclude: ['**/node_modules/**', '**/dist/**'],
		environment: 'node',
		globals: true,
		// Grammar WASM loading is the slowest step
		testTimeout: 30_000,
		hookTimeout: 30_000,
		pool: 'forks',
	},
});
