import path from 'node:path';

import { z } from 'zod';

import { ConfigError } from './errors.js';

export const DEFAULT_UN_PAGE_URL = 'https://main.un.org/securitycouncil/en/content/un-sc-consolidated-list';
export const DEFAULT_KDN_PAGE_URL =
  'https://www.moha.gov.my/index.php/en/maklumat-perkhidmatan/membanteras-pembiayaan-keganasan2/senarai-kementerian-dalam-negeri';

export interface PageRange {
  /** 0-based, inclusive */
  start: number;
  /** 0-based, inclusive */
  end: number;
}

export interface AppConfig {
  storage:
    | { kind: 'local'; outputDir: string }
    | { kind: 's3'; bucket: string; region: string; endpoint?: string };
  /** Fingerprint backend; the run ledger always lives in the SQLite file at `dbPath`. */
  state: 'blob' | 'sqlite';
  dbPath: string;
  sources: {
    un: { pageUrl: string; xmlUrl?: string };
    kdn: { pageUrl: string; groupPages: PageRange };
  };
  http: { timeoutMs: number; retries: number };
  logLevel: string;
}

const PAGE_RANGE_PATTERN = /^\s*(\d+)\s*-\s*(\d+)\s*$/;

const envSchema = z.object({
  SANCTIONS_SYNC_STORAGE: z.enum(['local', 's3']).default('local'),
  SANCTIONS_SYNC_OUTPUT_DIR: z.string().min(1).default('local_output'),
  SANCTIONS_SYNC_S3_BUCKET: z.string().min(1).default('unsc-kdn-json-bucket'),
  SANCTIONS_SYNC_S3_REGION: z.string().min(1).default('ap-southeast-1'),
  SANCTIONS_SYNC_S3_ENDPOINT: z.string().url().optional(),
  SANCTIONS_SYNC_STATE: z.enum(['blob', 'sqlite']).default('sqlite'),
  SANCTIONS_SYNC_DB_PATH: z.string().min(1).default('data/sync-state.db'),
  SANCTIONS_SYNC_UN_PAGE_URL: z.string().url().default(DEFAULT_UN_PAGE_URL),
  SANCTIONS_SYNC_UN_XML_URL: z.string().url().optional(),
  SANCTIONS_SYNC_KDN_PAGE_URL: z.string().url().default(DEFAULT_KDN_PAGE_URL),
  SANCTIONS_SYNC_KDN_GROUP_PAGES: z
    .string()
    .regex(PAGE_RANGE_PATTERN, 'expected a 1-based page range such as 12-14')
    .default('12-14'),
  SANCTIONS_SYNC_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SANCTIONS_SYNC_HTTP_RETRIES: z.coerce.number().int().min(1).max(10).default(3),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

/**
 * Parses a 1-based inclusive range like "12-14" into 0-based page indexes.
 */
export function parsePageRange(value: string): PageRange {
  const match = value.match(PAGE_RANGE_PATTERN);
  if (!match) {
    throw new ConfigError([`invalid page range: ${value}`]);
  }

  const first = Number.parseInt(match[1], 10);
  const last = Number.parseInt(match[2], 10);
  if (first < 1 || last < first) {
    throw new ConfigError([`invalid page range: ${value}`]);
  }

  return { start: first - 1, end: last - 1 };
}

/**
 * Builds the application config from an environment map. Blank values count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => {
      const value = entry[1];
      return typeof value === 'string' && value.trim().length > 0;
    }),
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const values = parsed.data;

  return {
    storage:
      values.SANCTIONS_SYNC_STORAGE === 's3'
        ? {
            kind: 's3',
            bucket: values.SANCTIONS_SYNC_S3_BUCKET,
            region: values.SANCTIONS_SYNC_S3_REGION,
            endpoint: values.SANCTIONS_SYNC_S3_ENDPOINT,
          }
        : { kind: 'local', outputDir: path.resolve(cwd, values.SANCTIONS_SYNC_OUTPUT_DIR) },
    state: values.SANCTIONS_SYNC_STATE,
    dbPath: path.resolve(cwd, values.SANCTIONS_SYNC_DB_PATH),
    sources: {
      un: {
        pageUrl: values.SANCTIONS_SYNC_UN_PAGE_URL,
        xmlUrl: values.SANCTIONS_SYNC_UN_XML_URL,
      },
      kdn: {
        pageUrl: values.SANCTIONS_SYNC_KDN_PAGE_URL,
        groupPages: parsePageRange(values.SANCTIONS_SYNC_KDN_GROUP_PAGES),
      },
    },
    http: {
      timeoutMs: values.SANCTIONS_SYNC_HTTP_TIMEOUT_MS,
      retries: values.SANCTIONS_SYNC_HTTP_RETRIES,
    },
    logLevel: values.LOG_LEVEL,
  };
}
