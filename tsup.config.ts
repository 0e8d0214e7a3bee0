import { defineConfig } from 'tsup'

export default defineConfig({
  entry: {
    index: 'src/index.ts',
    'cli/chromemanagement1': 'src/cli/bin/chromemanagement1.ts',
    'cli/customsearch1': 'src/cli/bin/customsearch1.ts',
    'cli/billingbudgets1-beta1': 'src/cli/bin/billingbudgets1-beta1.ts',
  },
  outDir: 'dist',
  format: ['esm', 'cjs'],
  dts: { entry: { index: 'src/index.ts' } },
  clean: true,
  splitting: false,
  treeshake: true,
  sourcemap: false,
  minify: false,
  platform: 'node',
  target: 'node20',
  skipNodeModulesBundle: true,
})
