/**
 * synthctl Engine — Error Types
 */

export type SelectionKind = 'targets' | 'agents';

/**
 * A plan selected no targets or no agents. A test is never created from
 * an empty selection.
 */
export class EmptySelectionError extends Error {
  constructor(
    readonly kind: SelectionKind,
    readonly testName: string,
  ) {
    super(`no ${kind} selected for test "${testName}"`);
    this.name = 'EmptySelectionError';
  }
}
