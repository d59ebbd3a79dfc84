import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { getPackageRoot } from './paths.js';

const PackageJsonSchema = z.object({ version: z.string() });

export function getPackageVersion(): string {
  const pkgPath = join(getPackageRoot(), 'package.json');
  try {
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(pkgPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch (err) {
    // package.json이 없거나 깨진 경우 (번들 배포 등)
    if (err instanceof SyntaxError || (err instanceof Error && 'code' in err && err.code === 'ENOENT')) {
      return '0.0.0';
    }
    throw err;
  }
}
