export class ConfigError extends Error {
  constructor(readonly errs: string[]) {
    super(`invalid configuration: ${errs.join(', ')}`);
    this.name = 'ConfigError';
  }
}

export class LedgerError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'LedgerError';
  }
}

export class BalanceUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BalanceUnavailableError';
  }
}
