/**
 * synthctl Runtime Host — Schema Issue Reporting
 *
 * Converts a failed zod parse into the ConfigurationError every other
 * configuration problem raises, located at the first offending key.
 */

import { ConfigurationError } from '@synthctl/match-dsl';
import type { ZodError } from 'zod';

/** `test.http.method`, `targets.devices[2]` */
export function issuePath(root: string, path: ReadonlyArray<string | number>): string {
  return path.reduce<string>((acc, key) => {
    if (typeof key === 'number') return `${acc}[${key}]`;
    return acc === '' ? key : `${acc}.${key}`;
  }, root);
}

export function toConfigurationError(error: ZodError, root = ''): ConfigurationError {
  const [first] = error.issues;
  if (first === undefined) {
    return new ConfigurationError('invalid configuration', root === '' ? undefined : root);
  }
  const location = issuePath(root, first.path);
  return new ConfigurationError(first.message, location === '' ? undefined : location);
}
