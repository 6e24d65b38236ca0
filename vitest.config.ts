import path from 'path'
import { defineConfig } from 'vitest/config'

export default defineConfig({
	resolve: {
		alias: {
			'@gametime/core': path.resolve(__dirname, 'packages/core/src/index.ts')
		}
	},
	test: {
		include: ['packages/*/tests/**/*.test.ts', 'backend/tests/**/*.test.ts'],
		environment: 'node'
	}
})
