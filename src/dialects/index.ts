export type { SourceDialect, SourceConfig } from './source';
export type { TargetDialect, TargetConfig, TargetType } from './target';
export { DEFAULT_BATCH_SIZE } from './target';
export { createSource, listSourceTypes, registerSource, withSource, type SourceType } from './source-registry';
export { createTarget, listTargetTypes, registerTarget, withTarget } from './target-registry';
export { toConnectionUrl, describeTarget } from './connection-url';

// Import dialects to register them
import './source/delimited-file';
import './target/sqlite';
import './target/postgresql';
