import * as path from 'path';
import { ValidationError } from '@tallystream/shared';

/**
 * Resolves a requested export file against the export directory.
 * Throws ValidationError when the result would land outside that directory.
 */
export function resolveExportPath(exportDir: string, requested: string): string {
  const root = path.resolve(exportDir);
  const target = path.resolve(root, requested);
  const relative = path.relative(root, target);

  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new ValidationError(`Export path must name a file inside ${root}`);
  }
  return target;
}
