// The server loads the pipeline package through its exports map once built

import { readFileSync } from 'node:fs';
import { describe, it, expect } from 'vitest';

function readJson(relative: string): unknown {
  return JSON.parse(readFileSync(new URL(relative, import.meta.url), 'utf8'));
}

describe('@prospect-intel/agents entry point', () => {
  const manifest = readJson('../../agents/package.json');

  it('resolves to compiled JavaScript inside the package for Node', () => {
    expect(manifest).toMatchObject({
      exports: {
        '.': { source: './index.ts', types: './dist/index.d.ts', default: './dist/index.js' },
      },
    });
  });

  it('builds the server against the compiled declarations', () => {
    expect(readJson('../tsconfig.build.json')).toMatchObject({
      compilerOptions: { customConditions: [], outDir: 'dist' },
    });
    expect(readJson('../../agents/tsconfig.build.json')).toMatchObject({
      compilerOptions: { declaration: true, outDir: 'dist' },
    });
  });
});
