import { homedir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { defaultPageSize, loadConfig, requireClientId } from './config';
import { ConfigError } from './errors';

describe('loadConfig', () => {
  it('fills in defaults', () => {
    expect(loadConfig({}, { EDITOR: 'nano' }, 30)).toEqual({
      clientId: undefined,
      tenantId: 'common',
      redirectPort: 8400,
      pageSize: 24,
      autoPageSize: true,
      folder: 'inbox',
      editor: 'nano',
      signature: '',
      logLevel: 'info',
      tokenCachePath: join(homedir(), '.termmail', 'tokens.json'),
    });
  });

  it('reads the environment and lets flags win', () => {
    const config = loadConfig(
      { pageSize: '30', tenant: 'contoso.example', logLevel: 'debug' },
      {
        TERMMAIL_CLIENT_ID: 'test-client',
        TERMMAIL_TENANT_ID: 'common',
        TERMMAIL_PAGE_SIZE: '15',
        TERMMAIL_REDIRECT_PORT: '9000',
        TERMMAIL_FOLDER: 'junk',
        TERMMAIL_EDITOR: 'micro',
        VISUAL: 'code --wait',
        TERMMAIL_SIGNATURE: 'Jo\\nExample Ltd',
        TERMMAIL_TOKEN_CACHE: '/tmp/tokens.json',
      },
      30
    );

    expect(config).toEqual({
      clientId: 'test-client',
      tenantId: 'contoso.example',
      redirectPort: 9000,
      pageSize: 30,
      autoPageSize: false,
      folder: 'junk',
      editor: 'micro',
      signature: 'Jo\nExample Ltd',
      logLevel: 'debug',
      tokenCachePath: '/tmp/tokens.json',
    });
  });

  it('prefers VISUAL over EDITOR', () => {
    expect(loadConfig({}, { VISUAL: 'emacs', EDITOR: 'nano' }, 30).editor).toBe('emacs');
  });

  it.each<[string, Record<string, string>]>([
    ['logLevel', { TERMMAIL_LOG_LEVEL: 'loud' }],
    ['pageSize', { TERMMAIL_PAGE_SIZE: 'many' }],
    ['redirectPort', { TERMMAIL_REDIRECT_PORT: '70000' }],
  ])('rejects a bad %s', (key, env) => {
    expect(() => loadConfig({}, { EDITOR: 'vi', ...env }, 30)).toThrow(ConfigError);
    expect(() => loadConfig({}, { EDITOR: 'vi', ...env }, 30)).toThrow(`Invalid configuration for ${key}`);
  });
});

describe('defaultPageSize', () => {
  it.each<[number | undefined, number]>([
    [undefined, 20],
    [8, 5],
    [30, 24],
    [100, 50],
  ])('%s rows -> %s', (rows, expected) => {
    expect(defaultPageSize(rows)).toBe(expected);
  });
});

describe('requireClientId', () => {
  it('insists on a client id', () => {
    const config = loadConfig({}, { EDITOR: 'vi' }, 30);
    expect(() => requireClientId(config)).toThrow(ConfigError);
    expect(requireClientId({ ...config, clientId: 'test-client' })).toBe('test-client');
  });
});
