import * as path from 'path';
import { register } from 'tsconfig-paths';

/** Mirrors `paths` in tsconfig.json; the compiled output keeps `@/` imports. */
export const PATH_ALIASES: Record<string, string[]> = {
  '@/*': ['*'],
};

/**
 * Resolves `@/` against the directory holding the compiled sources
 * (`dist/` after a build). Returns the function that undoes it.
 */
export function registerPathAliases(
  baseUrl = path.resolve(__dirname, '..'),
): () => void {
  return register({ baseUrl, paths: PATH_ALIASES });
}
