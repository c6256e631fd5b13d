/**
 * Public API.
 */
export { FragmentTable, loadFragmentTable, parseFragmentTable, stringifyFragmentTable, writeFragmentTableFile } from './fragments';
export { FragmentResolver, scanLines } from './anchors';
export type { ScanOptions, ScanResult } from './anchors';
export { applyInsertions, insertIntoLines, extractStubs, stripTraceSuffix, collectFragments, DEFAULT_TRACE_MARKER } from './insertion';
export type { ExtractedStub, InsertOptions } from './insertion';
export { FileIO, deriveOutputPath, decodeBuffer } from './io/file-io';
export type { FileIOAdapter, FileIOOptions, OutputTarget, ReadResult } from './io/file-io';
export { StubProcessor, findSourceFiles } from './processor';
export type { ContentResult, DirectoryOptions, ProcessorOptions, StubProcessorDeps } from './processor';
export { loadStubWeaveConfig, CONFIG_DEFAULTS, CONFIG_FILENAME } from './config';
export { createLogger, createRootLogger } from './shared/logger';
export * from './shared/types';
