import { createRequire } from 'node:module';
import { z } from 'zod';

const require = createRequire(import.meta.url);

const manifestSchema = z.object({ version: z.string().trim().min(1) });

export const getPackageVersion = (): string => {
  let manifest: unknown;
  try {
    manifest = require('../package.json');
  } catch {
    return '0.0.0';
  }

  const parsed = manifestSchema.safeParse(manifest);
  return parsed.success ? parsed.data.version : '0.0.0';
};
