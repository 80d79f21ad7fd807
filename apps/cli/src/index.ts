#!/usr/bin/env -S tsx
import { spawn } from 'node:child_process';
import chalk from 'chalk';
import { Command } from 'commander';
import {
  AuthError,
  GraphHttp,
  GraphMailbox,
  OAuthClient,
  TokenProvider,
  TokenStore,
  login,
} from '@termmail/graph-client';
import { createSessionStore, ListController } from '@termmail/mail-core';
import type { Logger } from '@termmail/shared';
import { loadConfig, requireClientId, type AppConfig, type CliFlags } from './config';
import { externalEditor } from './editor';
import { ConfigError, EXIT_CODES } from './errors';
import { resolveFolder } from './folders';
import { createLogger } from './logger';
import { runShell } from './shell';
import { followTerminalHeight, ReadlineTerminal } from './terminal';

function oauthFor(config: AppConfig): OAuthClient {
  return new OAuthClient({ clientId: requireClientId(config), tenantId: config.tenantId });
}

function openBrowser(url: string, logger: Logger): void {
  const [command, args]: [string, string[]] =
    process.platform === 'darwin'
      ? ['open', [url]]
      : process.platform === 'win32'
        ? ['cmd', ['/c', 'start', '""', url]]
        : ['xdg-open', [url]];
  const child = spawn(command, args, { stdio: 'ignore', detached: true });
  child.once('error', () => logger.debug(`Could not start ${command}; open the URL by hand`));
  child.unref();
}

async function runLogin(config: AppConfig, logger: Logger): Promise<void> {
  const store = new TokenStore(config.tokenCachePath);
  await login(oauthFor(config), store, {
    port: config.redirectPort,
    logger,
    onAuthorizeUrl: (url) => {
      console.log(chalk.dim('\nOpen this URL in your browser to sign in:\n'));
      console.log(chalk.cyan(url));
      console.log();
      openBrowser(url, logger);
    },
  });
  logger.info(`Signed in; tokens cached in ${store.path}`);
}

async function runMail(config: AppConfig, logger: Logger): Promise<void> {
  const store = new TokenStore(config.tokenCachePath);
  const tokens = new TokenProvider(store, oauthFor(config), logger);
  // Fail before the shell starts rather than on the first command.
  await tokens.getAccessToken();

  const mailbox = new GraphMailbox(new GraphHttp(tokens, { logger }));
  const folder = await resolveFolder(mailbox, config.folder);
  if (!folder.ok) throw new Error(folder.error.message);
  if (!folder.value) throw new ConfigError(`No folder named "${config.folder}"`);

  const session = createSessionStore({ folder: folder.value, pageSize: config.pageSize });
  const term = new ReadlineTerminal();
  const unfollow = config.autoPageSize ? followTerminalHeight(process.stdout, session) : undefined;
  try {
    await runShell(
      {
        mailbox,
        session,
        controller: new ListController(mailbox, session),
        term,
        editor: externalEditor(config.editor),
        signature: config.signature || undefined,
      },
      logger
    );
  } finally {
    unfollow?.();
    term.close();
  }
}

function exitCodeFor(err: unknown): number {
  if (err instanceof ConfigError) return EXIT_CODES.config;
  if (err instanceof AuthError) return EXIT_CODES.auth;
  return EXIT_CODES.other;
}

async function main(argv: string[]): Promise<void> {
  const program = new Command();
  program
    .name('termmail')
    .description('Read and manage a Microsoft 365 mailbox from the terminal')
    .version('0.1.0')
    .option('--client-id <id>', 'Azure AD application (client) id')
    .option('--tenant <tenant>', 'Azure AD tenant')
    .option('-n, --page-size <n>', 'messages per page')
    .option('-f, --folder <folder>', 'folder to open')
    .option('-e, --editor <command>', 'editor for drafts')
    .option('--log-level <level>', 'silent, error, warn, info or debug');

  let logger: Logger = createLogger('info');
  const setup = (): AppConfig => {
    const config = loadConfig(program.opts<CliFlags>());
    logger = createLogger(config.logLevel);
    return config;
  };

  program.action(async () => {
    await runMail(setup(), logger);
  });
  program
    .command('login')
    .description('sign in through the browser and cache the tokens')
    .action(async () => {
      await runLogin(setup(), logger);
    });
  program
    .command('logout')
    .description('forget cached tokens')
    .action(async () => {
      const config = setup();
      await new TokenStore(config.tokenCachePath).clear();
      logger.info('Signed out.');
    });

  try {
    await program.parseAsync(argv);
  } catch (err) {
    logger.error(err instanceof Error ? err.message : String(err));
    process.exitCode = exitCodeFor(err);
  }
}

await main(process.argv);
