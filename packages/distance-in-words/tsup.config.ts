import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    // Main entry point (formatter, classifier, locales, errors)
    index: 'src/index.ts',

    // =========================================================================
    // Granular entry points
    // =========================================================================
    classify: 'src/classify-entry.ts',
    coerce: 'src/coerce-entry.ts',
    locale: 'src/locale-entry.ts',

    // =========================================================================
    // Errors and results
    // =========================================================================
    errors: 'src/errors-entry.ts',
    'tagged-error': 'src/tagged-error-entry.ts',
    result: 'src/result.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: true,
});
