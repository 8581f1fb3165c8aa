export type { BookMetadataSource } from './types.js';
export { parseBookMetadata, parseNumPages, splitKeywords } from './parse-book-metadata.js';
export {
  SidecarMetadataSource,
  SIDECAR_SUFFIX,
  type SidecarMetadataSourceOptions,
} from './sidecar-source.js';
export {
  PromptMetadataSource,
  createTerminalPrompt,
  type AskFunction,
  type PromptMetadataSourceOptions,
} from './prompt-source.js';
export { ChainedMetadataSource } from './chained-source.js';
