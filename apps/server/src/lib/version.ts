import { createRequire } from 'module';
import { z } from 'zod';

const PackageJsonSchema = z.object({ version: z.string() });

/** Server version from this workspace's package.json. */
export const SERVER_VERSION: string = PackageJsonSchema.parse(
  createRequire(import.meta.url)('../../package.json'),
).version;
