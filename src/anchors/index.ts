export { scanLines } from './scanner';
export type { ScanOptions, ScanResult } from './scanner';
export { FragmentResolver } from './resolver';
export type { DirectiveCode } from './resolver';
