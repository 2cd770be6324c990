export { JsonMemoryStore, tokenize, jaccard, CONTEXT_PREVIEW_CHARS } from './memory-store';
export type { MemoryStoreOptions } from './memory-store';
