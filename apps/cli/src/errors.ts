/** Invalid configuration; the process exits with EXIT_CODES.config. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const EXIT_CODES = {
  config: 1,
  auth: 2,
  other: 3,
} as const;
