import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import type { LogLevel } from '@termmail/shared';
import { ConfigError } from './errors';

const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const satisfies readonly LogLevel[];

/** Flags from the command line; they override the environment. */
export type CliFlags = {
  clientId?: string;
  tenant?: string;
  pageSize?: string;
  folder?: string;
  editor?: string;
  logLevel?: string;
};

const configSchema = z.object({
  clientId: z.string().trim().min(1).optional(),
  tenantId: z.string().trim().min(1).default('common'),
  redirectPort: z.coerce.number().int().min(1).max(65535).default(8400),
  pageSize: z.coerce.number().int().min(1).max(500),
  /** Page size was derived from the terminal and follows its height */
  autoPageSize: z.boolean(),
  folder: z.string().trim().min(1).default('inbox'),
  editor: z.string().trim().min(1),
  signature: z.string().default(''),
  logLevel: z.enum(LOG_LEVELS).default('info'),
  tokenCachePath: z.string().min(1),
});

export type AppConfig = z.infer<typeof configSchema>;

/** Page size that fits the terminal: rows minus header and prompt, 5 to 50. */
export function defaultPageSize(rows: number | undefined): number {
  if (!rows) return 20;
  return Math.min(50, Math.max(5, rows - 6));
}

function defaultEditor(env: NodeJS.ProcessEnv): string {
  return (
    env.TERMMAIL_EDITOR ||
    env.VISUAL ||
    env.EDITOR ||
    (process.platform === 'win32' ? 'notepad' : 'vi')
  );
}

export function loadConfig(
  flags: CliFlags = {},
  env: NodeJS.ProcessEnv = process.env,
  rows: number | undefined = process.stdout.rows
): AppConfig {
  const explicitPageSize = flags.pageSize ?? env.TERMMAIL_PAGE_SIZE;
  const parsed = configSchema.safeParse({
    clientId: flags.clientId ?? env.TERMMAIL_CLIENT_ID,
    tenantId: flags.tenant ?? env.TERMMAIL_TENANT_ID,
    redirectPort: env.TERMMAIL_REDIRECT_PORT,
    pageSize: explicitPageSize ?? defaultPageSize(rows),
    autoPageSize: explicitPageSize === undefined,
    folder: flags.folder ?? env.TERMMAIL_FOLDER,
    editor: flags.editor ?? defaultEditor(env),
    signature: env.TERMMAIL_SIGNATURE?.replace(/\\n/g, '\n'),
    logLevel: flags.logLevel ?? env.TERMMAIL_LOG_LEVEL,
    tokenCachePath: env.TERMMAIL_TOKEN_CACHE ?? join(homedir(), '.termmail', 'tokens.json'),
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(
      issue ? `Invalid configuration for ${issue.path.join('.')}: ${issue.message}` : 'Invalid configuration'
    );
  }
  return parsed.data;
}

/** Client id is only needed once something talks to Graph. */
export function requireClientId(config: AppConfig): string {
  if (!config.clientId) {
    throw new ConfigError('No client id; set TERMMAIL_CLIENT_ID or pass --client-id');
  }
  return config.clientId;
}
