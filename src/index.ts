/**
 * Library entry point
 *
 * `createSession` wires a ready-to-run orchestrator from a resolved
 * configuration; the modules below expose each stage for embedding and
 * testing.
 */

export * from './types';
export * from './schemas';
export * from './core';
export * from './planning';
export * from './judge';
export * from './tools';
export * from './finalization';
export * from './config';
export * from './llm';
export * from './orchestration';
export * from './cli';
export * from './ui';
export { RealFileSystem, MemoryFileSystem } from './io';
export { ConsoleLogger, BufferLogger, formatSessionSummary, outcomeSnapshot } from './logging';
