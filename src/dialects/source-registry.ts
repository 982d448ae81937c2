import type { SourceDialect, SourceConfig } from './source';
import { ConfigInvalidError } from '../engine/errors';

export type SourceType = SourceConfig['type'];

type SourceDialectFactory = (config: SourceConfig) => SourceDialect;

const sources = new Map<SourceType, SourceDialectFactory>();

/**
 * Register a source dialect factory. Each dialect module registers itself on import.
 */
export const registerSource = (type: SourceType, factory: SourceDialectFactory): void => {
  sources.set(type, factory);
};

export const createSource = (config: SourceConfig): SourceDialect => {
  const factory = sources.get(config.type);
  if (!factory) {
    const available = listSourceTypes().join(', ');
    throw new ConfigInvalidError('source.type', `no source registered for "${config.type}" (available: ${available})`);
  }
  return factory(config);
};

/**
 * Open a source, run an operation against it, and release it afterwards.
 */
export const withSource = async <T>(config: SourceConfig, operation: (source: SourceDialect) => Promise<T>): Promise<T> => {
  const source = createSource(config);
  try {
    return await operation(source);
  } finally {
    if (source.close) {
      await source.close();
    }
  }
};

export const listSourceTypes = (): SourceType[] => [...sources.keys()];
