import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		environment: 'node',
		include: ['packages/*/test/**/*.test.ts'],
		testTimeout: 20000,
		coverage: {
			include: ['packages/*/src/**/*.ts'],
			exclude: ['packages/*/src/**/index.ts', 'packages/*/src/testing/**'],
			reporter: ['text', 'json', 'html', 'lcov'],
		},
	},
})
