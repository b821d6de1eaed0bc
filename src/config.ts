import path from 'node:path';
import { z } from 'zod';
import { FatalConfigError } from './errors.js';
import type { LogLevel } from './log.js';
import type { RunSettings } from './migrate/context.js';
import type { ProjectClassification } from './model.js';
import type { ScoroAuthField } from './providers/scoro.js';
import { retryPolicy, type RetryPolicy } from './retry.js';

const str = z.string().min(1);

/** Treat `KEY=` like an unset key. */
function opt<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((v) => (typeof v === 'string' && v.trim() === '' ? undefined : v), schema.optional());
}

const int = z.coerce.number().int();

export const EnvSchema = z.object({
  // source
  ASANA_ACCESS_TOKEN: opt(str),
  ASANA_WORKSPACE_GID: opt(str),

  // destination
  SCORO_API_KEY: opt(str),
  SCORO_COMPANY_ACCOUNT: opt(str),
  SCORO_AUTH_FIELD: opt(z.enum(['apiKey', 'user_token'])),

  // behavior
  MIGRATE_DEFAULT_USER_ID: opt(int.positive()),
  MIGRATE_LOG_LEVEL: opt(z.enum(['silent', 'error', 'warn', 'info', 'debug'])),
  MIGRATE_STATE_DIR: opt(str),
  MIGRATE_MONITOR_URL: opt(z.string().url()),
  MIGRATE_CUTOFF_DATE: opt(z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')),
  MIGRATE_TEAM_MEMBERS: opt(str),
  MIGRATE_PROJECT_CLASSIFICATION: opt(str),
  MIGRATE_USER_ALIASES: opt(str),
  MIGRATE_REUSE_PROJECTS: opt(z.enum(['true', 'false', '1', '0'])),

  // executor / http
  MIGRATE_MIN_INTERVAL_MS: opt(int.nonnegative()),
  MIGRATE_MAX_ATTEMPTS: opt(int.positive()),
  MIGRATE_RETRY_BASE_MS: opt(int.nonnegative()),
  MIGRATE_RETRY_MULTIPLIER: opt(z.coerce.number().min(1)),
  MIGRATE_RETRY_MAX_MS: opt(int.nonnegative()),
  MIGRATE_HTTP_TIMEOUT_MS: opt(int.positive()),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export function readEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const bad = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new FatalConfigError(`Invalid configuration: ${bad.join('; ')}`, [
      ...new Set(parsed.error.issues.map((i) => String(i.path[0]))),
    ]);
  }
  return parsed.data;
}

const REQUIRED = ['ASANA_ACCESS_TOKEN', 'SCORO_API_KEY', 'SCORO_COMPANY_ACCOUNT', 'MIGRATE_DEFAULT_USER_ID'] as const;

export function doctorReport(env = readEnv()) {
  const missing = REQUIRED.filter((k) => env[k] === undefined);
  const notes: string[] = [];

  if (!env.ASANA_WORKSPACE_GID) notes.push('ASANA_WORKSPACE_GID unset: lookups by name search every workspace.');
  if (!env.MIGRATE_MONITOR_URL) notes.push('MIGRATE_MONITOR_URL unset: no status notifications.');
  if (!env.MIGRATE_TEAM_MEMBERS) notes.push('MIGRATE_TEAM_MEMBERS unset: classification uses name patterns only.');
  if (env.MIGRATE_CUTOFF_DATE) notes.push(`Tasks created before ${env.MIGRATE_CUTOFF_DATE} need an assignee and a due date.`);

  return { missing: [...missing], notes };
}

/* ------------------------------------------------------------------ */
/*  List-valued variables                                              */
/* ------------------------------------------------------------------ */

export function parseList(v: string | undefined, sep = ','): string[] {
  return (v ?? '')
    .split(sep)
    .map((s) => s.trim())
    .filter(Boolean);
}

/** `123=client,456=team-member` */
export function parseClassificationOverrides(v: string | undefined): Record<string, ProjectClassification> {
  const out: Record<string, ProjectClassification> = {};
  for (const pair of parseList(v)) {
    const [id, kind] = pair.split('=').map((s) => s.trim());
    if (!id || (kind !== 'client' && kind !== 'team-member')) {
      throw new FatalConfigError(`MIGRATE_PROJECT_CLASSIFICATION: bad entry "${pair}"`, ['MIGRATE_PROJECT_CLASSIFICATION']);
    }
    out[id] = kind;
  }
  return out;
}

/** `Jo=Joanna Smith;Al=Alan Jones` */
export function parseAliases(v: string | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  for (const pair of parseList(v, ';')) {
    const eq = pair.indexOf('=');
    const short = pair.slice(0, eq).trim();
    const full = pair.slice(eq + 1).trim();
    if (eq === -1 || !short || !full) {
      throw new FatalConfigError(`MIGRATE_USER_ALIASES: bad entry "${pair}"`, ['MIGRATE_USER_ALIASES']);
    }
    out[short] = full;
  }
  return out;
}

/* ------------------------------------------------------------------ */
/*  Run configuration                                                  */
/* ------------------------------------------------------------------ */

export interface RunConfig {
  asana: { accessToken: string; workspaceId?: string };
  scoro: { apiKey: string; companyAccount: string; authField: ScoroAuthField };
  settings: Omit<RunSettings, 'dryRun'>;
  retry: RetryPolicy;
  httpTimeoutMs: number;
  logLevel: LogLevel;
  stateDir: string;
  monitorUrl?: string;
}

export interface RunConfigOverrides {
  stateDir?: string;
  workspaceId?: string;
}

/** Everything a migrate run needs, or FatalConfigError naming what is missing. */
export function buildRunConfig(env: EnvConfig, overrides: RunConfigOverrides = {}): RunConfig {
  const { missing } = doctorReport(env);
  const { ASANA_ACCESS_TOKEN, SCORO_API_KEY, SCORO_COMPANY_ACCOUNT, MIGRATE_DEFAULT_USER_ID } = env;
  if (
    missing.length ||
    !ASANA_ACCESS_TOKEN ||
    !SCORO_API_KEY ||
    !SCORO_COMPANY_ACCOUNT ||
    MIGRATE_DEFAULT_USER_ID === undefined
  ) {
    throw new FatalConfigError(`Missing configuration: ${missing.join(', ')}`, missing);
  }

  const overridesRetry: { -readonly [K in keyof RetryPolicy]?: RetryPolicy[K] } = {};
  if (env.MIGRATE_MAX_ATTEMPTS !== undefined) overridesRetry.maxAttempts = env.MIGRATE_MAX_ATTEMPTS;
  if (env.MIGRATE_RETRY_BASE_MS !== undefined) overridesRetry.baseDelayMs = env.MIGRATE_RETRY_BASE_MS;
  if (env.MIGRATE_RETRY_MULTIPLIER !== undefined) overridesRetry.multiplier = env.MIGRATE_RETRY_MULTIPLIER;
  if (env.MIGRATE_RETRY_MAX_MS !== undefined) overridesRetry.maxDelayMs = env.MIGRATE_RETRY_MAX_MS;
  if (env.MIGRATE_MIN_INTERVAL_MS !== undefined) overridesRetry.minIntervalMs = env.MIGRATE_MIN_INTERVAL_MS;

  let retry: RetryPolicy;
  try {
    retry = retryPolicy(overridesRetry);
  } catch (e) {
    throw new FatalConfigError(`Invalid retry settings: ${e instanceof Error ? e.message : String(e)}`);
  }

  return {
    asana: { accessToken: ASANA_ACCESS_TOKEN, workspaceId: overrides.workspaceId ?? env.ASANA_WORKSPACE_GID },
    scoro: { apiKey: SCORO_API_KEY, companyAccount: SCORO_COMPANY_ACCOUNT, authField: env.SCORO_AUTH_FIELD ?? 'apiKey' },
    settings: {
      fallbackUserId: MIGRATE_DEFAULT_USER_ID,
      reuseExistingProjects: env.MIGRATE_REUSE_PROJECTS === undefined || ['true', '1'].includes(env.MIGRATE_REUSE_PROJECTS),
      cutoffDate: env.MIGRATE_CUTOFF_DATE,
      teamMembers: parseList(env.MIGRATE_TEAM_MEMBERS),
      classificationOverrides: parseClassificationOverrides(env.MIGRATE_PROJECT_CLASSIFICATION),
      userAliases: parseAliases(env.MIGRATE_USER_ALIASES),
    },
    retry,
    httpTimeoutMs: env.MIGRATE_HTTP_TIMEOUT_MS ?? 30_000,
    logLevel: env.MIGRATE_LOG_LEVEL ?? 'info',
    stateDir: path.resolve(overrides.stateDir ?? env.MIGRATE_STATE_DIR ?? '.migrate'),
    monitorUrl: env.MIGRATE_MONITOR_URL,
  };
}
