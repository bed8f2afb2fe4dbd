/**
 * Base error class for reelkeeper
 */
export class ReelkeeperError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReelkeeperError';
  }
}

/**
 * Configuration error
 */
export class ConfigError extends ReelkeeperError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Remote program, episode or manifest lookup failed
 */
export class CatalogFetchError extends ReelkeeperError {
  constructor(
    message: string,
    public readonly programId: string,
    public readonly episodeId?: string,
  ) {
    super(message);
    this.name = 'CatalogFetchError';
  }
}

/**
 * Catalog answered, but the body did not match the expected shape
 */
export class CatalogParseError extends CatalogFetchError {
  constructor(message: string, programId: string, episodeId?: string) {
    super(message, programId, episodeId);
    this.name = 'CatalogParseError';
  }
}

/**
 * Stream manifest had no usable variant
 */
export class NoStreamAvailableError extends ReelkeeperError {
  constructor(public readonly episodeId: string) {
    super(`No stream available for episode ${episodeId}`);
    this.name = 'NoStreamAvailableError';
  }
}

/**
 * External media fetch failed or produced no usable file
 */
export class FetchSubprocessError extends ReelkeeperError {
  constructor(
    message: string,
    public readonly destination: string,
    public readonly exitCode?: number,
    public readonly outputTail: string[] = [],
  ) {
    super(message);
    this.name = 'FetchSubprocessError';
  }
}

/**
 * Durable ledger append failed
 */
export class LedgerWriteError extends ReelkeeperError {
  constructor(
    message: string,
    public readonly ledgerPath: string,
  ) {
    super(message);
    this.name = 'LedgerWriteError';
  }
}

/**
 * A stored ledger record that could not be parsed.
 * Reported on load, never thrown.
 */
export class LedgerCorruptionWarning extends ReelkeeperError {
  constructor(
    message: string,
    public readonly ledgerPath: string,
    public readonly lineNumber: number,
  ) {
    super(`${ledgerPath}:${lineNumber}: ${message}`);
    this.name = 'LedgerCorruptionWarning';
  }
}

/**
 * Render any thrown value as a single message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
