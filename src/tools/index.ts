export type { DocumentHit, SearchRequest, SearchTool } from './search-tool';
export { hitDocumentName, hitLocator, docCodeMatches } from './search-tool';
export type { VespaSearchToolOptions } from './vespa-search-tool';
export { VespaSearchTool, buildYql, buildSearchBody } from './vespa-search-tool';
export type { CorpusDocument } from './memory-search-tool';
export { MemorySearchTool, loadCorpus } from './memory-search-tool';
export { evaluateExpression, resolveVariables, runCalculation, tokenizeExpression } from './calculator';
export type { ModelToolOptions } from './document-analyzer';
export { DocumentAnalyzer, Reasoner, formatHits } from './document-analyzer';
export type { StepDispatcherOptions, DispatchOutcome } from './step-dispatcher';
export { StepDispatcher, selectSource } from './step-dispatcher';
