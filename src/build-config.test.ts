import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

const BuildConfigSchema = z.object({
  extends: z.string(),
  exclude: z.array(z.string()),
});

describe('build configuration', () => {
  it('leaves tests and test helpers out of dist', () => {
    const raw: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'tsconfig.build.json'), 'utf-8'));
    const config = BuildConfigSchema.parse(raw);

    expect(config.extends).toBe('./tsconfig.json');
    expect(config.exclude).toEqual(expect.arrayContaining(['src/**/*.test.ts', 'src/testing/**']));
  });

  it('builds with the build configuration', () => {
    const scripts = z
      .object({ scripts: z.object({ build: z.string() }) })
      .parse(JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf-8')));

    expect(scripts.scripts.build).toBe('tsc -p tsconfig.build.json');
  });
});
