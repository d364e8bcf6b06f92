/**
 * Package integrity tests: package.json entry points and the VERSION constant.
 */

import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

const pkgPath = fileURLToPath(new URL('../package.json', import.meta.url));
const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8'));

describe('package.json', () => {
  it('publishes only dist', () => {
    expect(pkg.files).toEqual(['dist']);
  });

  it('points main, types and exports at dist', () => {
    expect(pkg.main).toBe('./dist/index.js');
    expect(pkg.types).toBe('./dist/index.d.ts');
    expect(pkg.exports['.'].import).toBe('./dist/index.js');
    expect(pkg.exports['.'].types).toBe('./dist/index.d.ts');
  });
});

describe('VERSION constant', () => {
  it('matches package.json version', async () => {
    const mod = await import('../src/index.js');
    expect(mod.VERSION).toBe(pkg.version);
  });

  it('exports the public API', async () => {
    const mod = await import('../src/index.js');
    expect(typeof mod.ConfigScope).toBe('function');
    expect(typeof mod.parseScope).toBe('function');
    expect(typeof mod.checkTreeAllRead).toBe('function');
    expect(typeof mod.OptionId).toBe('function');
  });
});
