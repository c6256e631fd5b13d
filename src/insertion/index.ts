export {
  DEFAULT_TRACE_MARKER,
  applyInsertions,
  formatStubLine,
  insertIntoContent,
  insertIntoLines,
  joinContent,
  orderForInsertion,
  splitCodeLines,
  splitContent,
  traceSuffix,
} from './engine';
export type { InsertOptions, InsertResult, SplitContent } from './engine';
export { collectFragments, extractStubs, stripTraceSuffix } from './extract';
export type { CollectResult, ExtractOptions, ExtractedStub } from './extract';
