export { ReadStream, type ReadFileSystem, type ProgressCallback, readFile } from './file-system';
export { MemoryReadFileSystem } from './memory-file-system';
export { NodeReadFileSystem } from './node-file-system';
