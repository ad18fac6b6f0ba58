import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'node:url'

export default defineConfig({
	resolve: {
		alias: {
			'@windflow/flow/testing': fileURLToPath(new URL('./packages/flow/src/testing.ts', import.meta.url)),
			'@windflow/flow': fileURLToPath(new URL('./packages/flow/src/index.ts', import.meta.url)),
			'@': fileURLToPath(new URL('./packages/flow/src', import.meta.url)),
		},
	},
	test: {
		include: ['packages/*/tests/**/*.test.ts'],
		testTimeout: 15_000,
	},
})
