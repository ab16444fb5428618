import { defineConfig } from 'vitest/config'

export default defineConfig(async () => {
  // `vite-tsconfig-paths` is ESM-only; loading it via dynamic import avoids
  // Vite's config bundler trying to `require()` it.
  const { default: tsconfigPaths } = await import('vite-tsconfig-paths')

  return {
    plugins: [tsconfigPaths()],
    test: {
      environment: 'node',
      include: ['src/**/*.test.ts'],
    },
  }
})
