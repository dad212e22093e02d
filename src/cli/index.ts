/**
 * CLI Module
 */

export { parseArgs, toCliFlags } from './arg-parser';
export { getUsageText, printUsage } from './help';
export type { ParsedArgs, ParseResult } from './types';
export { DEFAULT_ARGS } from './types';
export type { CliEnvironment } from './run';
export { runCli, exitCodeFor } from './run';
