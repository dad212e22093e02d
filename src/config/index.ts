/**
 * Config module - configuration resolution
 */

export type { CliFlags, FileConfig, ResolveConfigOptions } from './resolve-config';
export { resolveConfig, loadConfigFile, generateRunId } from './resolve-config';
export { formatConfigForDisplay } from './format-config';
