import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		// Layout code is pure; no DOM needed
		environment: 'node',
		include: ['src/**/*.test.ts'],
		exclude: ['node_modules', 'dist'],
		globals: true,
	},
});
