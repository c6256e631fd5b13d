/**
 * Barrel export for the fragments module.
 */
export { FragmentTable, normalizeId } from './table';

export { parseFragmentTable, loadFragmentTable } from './loader';
export type { FragmentLoadWarning, LoadFragmentsResult } from './loader';

export { stringifyFragmentTable, writeFragmentTableFile } from './writer';
