import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		environment: 'node',
		include: ['test/**/*.{test,spec}.ts'],
		// Disk tests touch the file system, allow for slow CI disks
		testTimeout: 30000,
		restoreMocks: true
	},
});
