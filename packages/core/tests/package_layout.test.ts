import { describe, it, expect } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

// The runtime entry must be where the build writes it; types resolve from sources.

type PackageManifest = { main?: string; types?: string; exports?: Record<string, { types?: string; default?: string }> };
type BuildConfig = { compilerOptions?: { rootDir?: string; outDir?: string } };

const pkgDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');
const repoRoot = path.resolve(pkgDir, '..', '..');

function built(srcFile: string, cfg: BuildConfig): string {
  const rootDir = path.resolve(repoRoot, cfg.compilerOptions?.rootDir ?? '.');
  const outDir = path.resolve(repoRoot, cfg.compilerOptions?.outDir ?? 'dist');
  return path.join(outDir, path.relative(rootDir, srcFile)).replace(/\.ts$/, '.js');
}

describe('package layout', () => {
  it('points main and the default export at the build output of src/index.ts', () => {
    const pkg: PackageManifest = JSON.parse(fs.readFileSync(path.join(pkgDir, 'package.json'), 'utf8'));
    const cfg: BuildConfig = JSON.parse(fs.readFileSync(path.join(repoRoot, 'tsconfig.build.json'), 'utf8'));
    const expected = built(path.join(pkgDir, 'src', 'index.ts'), cfg);

    expect(path.resolve(pkgDir, pkg.exports?.['.']?.default ?? '')).toBe(expected);
    expect(path.resolve(pkgDir, pkg.main ?? '')).toBe(expected);
  });

  it('resolves types from the TypeScript sources', () => {
    const pkg: PackageManifest = JSON.parse(fs.readFileSync(path.join(pkgDir, 'package.json'), 'utf8'));
    const typesEntry = path.resolve(pkgDir, pkg.exports?.['.']?.types ?? '');
    expect(typesEntry).toBe(path.join(pkgDir, 'src', 'index.ts'));
    expect(fs.existsSync(typesEntry)).toBe(true);
  });
});
