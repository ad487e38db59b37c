// packages/server/src/gateway/directory/index.ts
export type { ChatDirectory } from './types.js';
export { InMemoryDirectory } from './memory.js';
export { DirectoryError } from './errors.js';
export { DirectorySnapshotSchema, parseDirectorySnapshot, loadDirectorySnapshot } from './snapshot.js';
