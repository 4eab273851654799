import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';
import { fileURLToPath } from 'node:url';
import { afterEach } from 'vitest';

export const fixturesDir = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'fixtures');

export function fixturePath(name: string): string {
  return join(fixturesDir, name);
}

export function loadFixture(name: string): string {
  return readFileSync(fixturePath(name), 'utf-8');
}

/** Wrap epic elements in a plan root */
export function planXml(body: string, version = '1.0'): string {
  return `<?xml version="1.0" encoding="UTF-8"?>\n<plan version="${version}">${body}</plan>`;
}

/**
 * Create a test context with auto-cleanup.
 * Temp dirs are removed automatically in afterEach.
 */
export function testContext() {
  const tempDirs: string[] = [];

  afterEach(() => {
    for (const dir of tempDirs.splice(0)) {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  return {
    createTempDir(): string {
      const dir = mkdtempSync(join(tmpdir(), 'plangraph-test-'));
      tempDirs.push(dir);
      return dir;
    },
  };
}
