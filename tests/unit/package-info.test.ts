import { readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { getPackageInfo } from '../../src/utils/package-info.js';

describe('getPackageInfo', () => {
  it('should return a valid version string', () => {
    expect(getPackageInfo().version).toMatch(/^\d+\.\d+\.\d+/);
  });

  it('should match the actual package.json values', async () => {
    const root = join(dirname(fileURLToPath(import.meta.url)), '../..');
    const expected: unknown = JSON.parse(await readFile(join(root, 'package.json'), 'utf-8'));

    expect(expected).toMatchObject(getPackageInfo());
    expect(getPackageInfo().name).toBe('tracewright');
  });
});
