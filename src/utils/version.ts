import { readFileSync } from 'node:fs';
import path from 'node:path';

import { z } from 'zod';

const PackageJsonSchema = z.object({ version: z.string().trim().min(1) });

let cachedVersion: string | undefined;

export function getCliVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  // src/utils and dist/utils both sit two levels below package.json.
  const packageJsonPath = path.resolve(__dirname, '../../package.json');
  try {
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf8')));
    cachedVersion = parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    cachedVersion = '0.0.0';
  }
  return cachedVersion;
}
