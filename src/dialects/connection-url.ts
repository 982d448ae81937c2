import type { TargetConfig } from './target';

/**
 * Connection URL for a target.
 * Embedded: `sqlite:///<database-path>`.
 * Networked: `postgresql://<user>:<password>@<host>:<port>/<database>`.
 */
export const toConnectionUrl = (config: TargetConfig): string => {
  if (config.type === 'sqlite') {
    return `sqlite:///${config.database}`;
  }

  const user = encodeURIComponent(config.user);
  const password = encodeURIComponent(config.password);
  return `postgresql://${user}:${password}@${config.host}:${config.port}/${config.database}`;
};

/** Same URL with the password masked, for logs */
export const describeTarget = (config: TargetConfig): string => {
  if (config.type === 'sqlite') {
    return `${toConnectionUrl(config)} → ${config.table}`;
  }
  return `postgresql://${config.user}:***@${config.host}:${config.port}/${config.database} → ${config.table}`;
};
