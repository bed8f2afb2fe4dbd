import { describe, expect, it } from 'vitest';
import {
  CatalogFetchError,
  CatalogParseError,
  ConfigError,
  errorMessage,
  FetchSubprocessError,
  LedgerCorruptionWarning,
  LedgerWriteError,
  NoStreamAvailableError,
  ReelkeeperError,
} from './custom-errors';

describe('Custom Errors', () => {
  it('ReelkeeperError should store message and have correct name', () => {
    const error = new ReelkeeperError('test message');
    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe('test message');
    expect(error.name).toBe('ReelkeeperError');
  });

  it('ConfigError should inherit from ReelkeeperError', () => {
    const error = new ConfigError('config error');
    expect(error).toBeInstanceOf(ReelkeeperError);
    expect(error.name).toBe('ConfigError');
  });

  it('CatalogParseError should be a CatalogFetchError with ids', () => {
    const error = new CatalogParseError('bad body', '42', 'ep1');
    expect(error).toBeInstanceOf(CatalogFetchError);
    expect(error.name).toBe('CatalogParseError');
    expect(error.programId).toBe('42');
    expect(error.episodeId).toBe('ep1');
  });

  it('NoStreamAvailableError should name the episode', () => {
    const error = new NoStreamAvailableError('ep9');
    expect(error.message).toBe('No stream available for episode ep9');
    expect(error.episodeId).toBe('ep9');
  });

  it('FetchSubprocessError should keep exit code and output tail', () => {
    const error = new FetchSubprocessError('ffmpeg exited with code 1', '/tmp/a.mp4', 1, ['line']);
    expect(error.exitCode).toBe(1);
    expect(error.outputTail).toEqual(['line']);
    expect(error.destination).toBe('/tmp/a.mp4');
  });

  it('LedgerCorruptionWarning should prefix location', () => {
    const warning = new LedgerCorruptionWarning('Unexpected token', 'ledger.jsonl', 3);
    expect(warning.message).toBe('ledger.jsonl:3: Unexpected token');
    expect(warning.lineNumber).toBe(3);
  });

  it('LedgerWriteError should have ledgerPath property', () => {
    const error = new LedgerWriteError('disk full', '/data/ledger.jsonl');
    expect(error).toBeInstanceOf(ReelkeeperError);
    expect(error.ledgerPath).toBe('/data/ledger.jsonl');
  });

  it('errorMessage should handle non-Error values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(7)).toBe('7');
  });
});
