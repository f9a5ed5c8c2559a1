/**
 * synthctl CLI — Error Rendering
 */

import { EmptySelectionError } from '@synthctl/engine';
import { ConfigurationError } from '@synthctl/match-dsl';
import { ApiRequestError } from '@synthctl/runtime-host';

/** One line describing an error, prefixed with its category. */
export function describeError(err: unknown): string {
  if (err instanceof ConfigurationError) {
    return `configuration: ${err.message}`;
  }
  if (err instanceof EmptySelectionError) {
    return `selection: ${err.message}`;
  }
  if (err instanceof ApiRequestError) {
    return `api: ${err.operation}: ${err.message}`;
  }
  return err instanceof Error ? err.message : String(err);
}
