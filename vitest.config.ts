import { defineConfig } from 'vitest/config';

export default defineConfig({
  plugins: [
    {
      // Sources import siblings as ./x.js (NodeNext); point Vite at the .ts file
      name: 'resolve-js-to-ts',
      resolveId(source, importer) {
        if (source.endsWith('.js') && importer && !source.includes('node_modules')) {
          return this.resolve(source.replace(/\.js$/, '.ts'), importer, { skipSelf: true });
        }
        return null;
      },
    },
  ],
  test: {
    include: ['src/**/__tests__/*.test.ts'],
    globals: true,
  },
});
