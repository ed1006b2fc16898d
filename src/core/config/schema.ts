/**
 * Schema for packwerk.yml.
 */
import { z } from 'zod';

/**
 * Makes an object field optional and applies the inner schema's defaults
 * when it is missing. Both undefined and null are treated as missing.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const DEFAULT_INCLUDE = ['**/*.rb', '**/*.rake'];
export const DEFAULT_EXCLUDE = ['{bin,node_modules,script,tmp,vendor}/**/*'];
export const DEFAULT_PACKAGE_PATHS = ['**/'];
export const DEFAULT_CACHE_DIRECTORY = 'tmp/cache/packwerk';

/** A single glob or a list of globs. */
const GlobListSchema = z.union([z.string(), z.array(z.string())]).transform((value) =>
  typeof value === 'string' ? [value] : value
);

export const ConfigSchema = withDefaults(
  z.object({
    /** Globs of files to analyze, relative to the project root */
    include: GlobListSchema.default(DEFAULT_INCLUDE),
    /** Globs of files never analyzed */
    exclude: GlobListSchema.default(DEFAULT_EXCLUDE),
    /** Globs of directories that may hold a package.yml */
    package_paths: GlobListSchema.default(DEFAULT_PACKAGE_PATHS),
    /** Reuse extraction results for unchanged files */
    cache: z.boolean().default(true),
    cache_directory: z.string().default(DEFAULT_CACHE_DIRECTORY),
  })
);

export type Config = z.infer<typeof ConfigSchema>;
