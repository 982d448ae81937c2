import type { TargetDialect, TargetConfig, TargetType } from './target';
import { ConfigInvalidError } from '../engine/errors';

type TargetDialectFactory = (config: TargetConfig) => TargetDialect;

const targets = new Map<TargetType, TargetDialectFactory>();

/**
 * Register a target dialect factory. Each dialect module registers itself on import.
 */
export const registerTarget = (type: TargetType, factory: TargetDialectFactory): void => {
  targets.set(type, factory);
};

export const createTarget = (config: TargetConfig): TargetDialect => {
  const factory = targets.get(config.type);
  if (!factory) {
    const available = listTargetTypes().join(', ');
    throw new ConfigInvalidError('target.type', `no target registered for "${config.type}" (available: ${available})`);
  }
  return factory(config);
};

/**
 * Open a target, run an operation against it, and always release it.
 * Each logical operation gets its own connection pool.
 */
export const withTarget = async <T>(config: TargetConfig, operation: (target: TargetDialect) => Promise<T>): Promise<T> => {
  const target = createTarget(config);
  try {
    return await operation(target);
  } finally {
    await target.close();
  }
};

export const listTargetTypes = (): TargetType[] => [...targets.keys()];
