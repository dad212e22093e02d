export { RealFileSystem } from './real-file-system';
export { MemoryFileSystem } from './memory-file-system';
