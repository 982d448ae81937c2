type AnsiColor = {
  reset: string;
  dim: string;
  bold: string;
  red: string;
  green: string;
  yellow: string;
  cyan: string;
};

const COLORS: Readonly<AnsiColor> = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
};

const pad = (n: number, len = 2): string => String(n).padStart(len, '0');

const timestamp = (): string => {
  const d = new Date();
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
};

export const formatNumber = (n: number): string => n.toLocaleString('en-US');

export const formatElapsed = (elapsedMs: number): string => {
  if (elapsedMs < 60_000) {
    return `${(elapsedMs / 1000).toFixed(1)}s`;
  }

  const minutes = Math.floor(elapsedMs / 60_000);
  const seconds = Math.round((elapsedMs % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
};

export const log = {
  info: (message: string) => {
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${message}`);
  },

  success: (message: string) => {
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.green}${message}${COLORS.reset}`);
  },

  warn: (message: string) => {
    console.warn(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.yellow}WARN${COLORS.reset}  ${message}`);
  },

  error: (message: string) => {
    console.error(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.red}ERR${COLORS.reset}   ${message}`);
  },

  ingest: {
    start: (config: { profile: string; source: string; target: string; mode: string; batchSize: number }) => {
      const mode = config.mode === 'replace' ? `${COLORS.yellow}replace${COLORS.reset}` : config.mode;
      const lines = [
        '',
        `${COLORS.bold}Ingestion started${COLORS.reset}`,
        `  profile:    ${config.profile}`,
        `  source:     ${config.source}`,
        `  target:     ${config.target}`,
        `  mode:       ${mode}`,
        `  batch size: ${formatNumber(config.batchSize)}`,
        '',
      ];
      console.info(lines.join('\n'));
    },

    summary: (stats: { read: number; written: number; batches: number; indexes: number; elapsed: number }) => {
      const lines = [
        '',
        `${COLORS.dim}${'─'.repeat(50)}${COLORS.reset}`,
        `  ${COLORS.green}${COLORS.bold}COMPLETED${COLORS.reset}  ${COLORS.dim}(${formatElapsed(stats.elapsed)})${COLORS.reset}`,
        '',
        `  read:     ${COLORS.bold}${formatNumber(stats.read)}${COLORS.reset}`,
        `  written:  ${COLORS.green}${formatNumber(stats.written)}${COLORS.reset}`,
        `  batches:  ${formatNumber(stats.batches)}`,
        `  indexes:  ${formatNumber(stats.indexes)}`,
        `${COLORS.dim}${'─'.repeat(50)}${COLORS.reset}`,
        '',
      ];
      console.info(lines.join('\n'));
    },
  },

  db: (action: string, count: number, elapsed: number) => {
    const tag = `${COLORS.dim}db${COLORS.reset}`;
    const time = (() => {
      if (elapsed > 1000) {
        return `${COLORS.yellow}${elapsed}ms${COLORS.reset}`;
      }
      return `${COLORS.dim}${elapsed}ms${COLORS.reset}`;
    })();
    console.info(
      `${COLORS.dim}${timestamp()}${COLORS.reset}  ${tag}     ${action} ${COLORS.bold}${formatNumber(count)}${
        COLORS.reset
      } rows  ${time}`
    );
  },

  perf: (label: string, metrics: { elapsedMs: number; rssDeltaMb: number; rssMb: number }) => {
    const tag = `${COLORS.cyan}perf${COLORS.reset}`;
    console.info(
      `${COLORS.dim}${timestamp()}${COLORS.reset}  ${tag}   ${label}  ${formatElapsed(metrics.elapsedMs)}  ` +
        `${COLORS.dim}mem ${metrics.rssDeltaMb.toFixed(2)} MB, rss ${metrics.rssMb.toFixed(2)} MB${COLORS.reset}`
    );
  },

  knex: {
    warn: (message: string) => {
      log.warn(`[knex] ${message}`);
    },
    error: (message: string) => {
      log.error(`[knex] ${message}`);
    },
  },
};

interface DbErrorFields {
  code?: unknown;
  detail?: unknown;
  constraint?: unknown;
  table?: unknown;
  hint?: unknown;
}

const hasDbErrorFields = (err: unknown): err is DbErrorFields =>
  err !== null && typeof err === 'object' && 'code' in err;

// Knex prefixes a failed query's message with the statement and its bound values
const KNEX_QUERY_PREFIX = /^\s*(select|insert|update|delete|create|drop|alter|with|pragma)\b/i;
const KNEX_SEPARATOR = ' - ';

const backendMessage = (message: string): string => {
  const at = message.lastIndexOf(KNEX_SEPARATOR);
  if (at === -1 || !KNEX_QUERY_PREFIX.test(message)) {
    return message;
  }
  return message.slice(at + KNEX_SEPARATOR.length);
};

/**
 * One-line diagnostic for any database error, without the failed statement.
 * Driver fields (SQLite result code, PostgreSQL code, detail, hint...) are appended.
 */
export const formatDbError = (err: unknown): string => {
  const msg = err instanceof Error ? err.message : String(err);
  const firstLine = backendMessage(msg).split('\n')[0].trim();

  if (!hasDbErrorFields(err)) {
    return firstLine;
  }

  const fields: Array<[string, unknown]> = [
    ['code', err.code],
    ['detail', err.detail],
    ['constraint', err.constraint],
    ['table', err.table],
    ['hint', err.hint],
  ];

  const extra = fields
    .filter((field): field is [string, string] => typeof field[1] === 'string' && field[1] !== '')
    .map(([k, v]) => `${k}=${v}`)
    .join(', ');

  return extra ? `${firstLine} (${extra})` : firstLine;
};
