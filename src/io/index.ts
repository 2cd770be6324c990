/**
 * IO module - filesystem and subprocess abstractions for testability
 */

export { RealFileSystem, createRealFileSystem, toFileSystemError } from './real-file-system';
export { MemoryFileSystem, createMemoryFileSystem } from './memory-file-system';

// Subprocess execution
export { RealProcessRunner, createRealProcessRunner } from './real-process-runner';
export { MockProcessRunner } from './mock-process-runner';
export type { MockProcessConfig, MockProcessCall } from './mock-process-runner';

// Result record persistence
export { ResultStore, RESULT_FILE_NAME } from './result-store';
export type { ResultRecord, ResultRecordContext } from './result-store';
