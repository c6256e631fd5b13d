export { StubProcessor } from './stub-processor';
export type { ContentResult, DirectoryOptions, ProcessorOptions, StubProcessorDeps } from './stub-processor';
export { findSourceFiles } from './file-discovery';
export type { DiscoveryOptions } from './file-discovery';
