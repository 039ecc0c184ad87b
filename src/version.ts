import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  // src/version.ts and dist/version.js both sit one level below package.json
  const pkgPath = path.join(__dirname, '..', 'package.json');
  try {
    const parsed = PackageJsonSchema.safeParse(JSON.parse(fs.readFileSync(pkgPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

export const VERSION = readVersion();
