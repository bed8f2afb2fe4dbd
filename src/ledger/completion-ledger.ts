import { mkdir, open, readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { errorMessage, LedgerCorruptionWarning, LedgerWriteError } from '../errors/custom-errors';
import type { DedupKey, LedgerEntry } from '../types/ledger.types';
import { QualityTierSchema } from '../types/quality-tier';
import { dedupKeyOf, dedupKeyString } from './dedup-key';

/**
 * Shape of one persisted ledger line
 */
export const LedgerEntrySchema = z.object({
  programTitle: z.string().min(1),
  firstrun: z.string().min(1),
  programId: z.string().optional(),
  episodeId: z.string().optional(),
  episodeTitle: z.string().optional(),
  foreignTitle: z.string().optional(),
  path: z.string().min(1),
  quality: QualityTierSchema,
  audioOnly: z.boolean().optional(),
  completedAt: z.string().min(1).optional(),
});

const LegacyIdSchema = z.union([z.string().min(1), z.number().int()]).transform((id) => String(id));

/**
 * Records written by earlier releases (snake_case, no output path)
 */
export const LegacyLedgerRecordSchema = z.object({
  id: LegacyIdSchema,
  program_id: LegacyIdSchema.nullish(),
  program_title: z.string().min(1),
  title: z.string().nullish(),
  foreign_title: z.string().nullish(),
  quality_str: QualityTierSchema,
  firstrun: z.string().nullish(),
});

export type LegacyLedgerRecord = z.infer<typeof LegacyLedgerRecordSchema>;

/**
 * Convert a legacy record. Its file was named
 * `<program> ||| <title> ||| <foreign> [<quality>] [<id>].mp4`, with "/"
 * replaced by "|" and missing titles written as "None".
 */
export function fromLegacyRecord(record: LegacyLedgerRecord, downloadDir: string): LedgerEntry {
  const fileName =
    `${record.program_title} ||| ${record.title ?? 'None'} ||| ${record.foreign_title ?? 'None'} ` +
    `[${record.quality_str}] [${record.id}]`;
  return {
    ...dedupKeyOf({ title: record.program_title }, { id: record.id, firstrun: record.firstrun ?? undefined }),
    programId: record.program_id ?? undefined,
    episodeId: record.id,
    episodeTitle: record.title ?? undefined,
    foreignTitle: record.foreign_title ?? undefined,
    path: join(downloadDir, `${fileName.replace(/\//g, '|')}.mp4`),
    quality: record.quality_str,
  };
}

export type CompletionLedgerOptions = {
  /** Where files named by legacy records live (default: `downloads` beside the ledger) */
  legacyDownloadDir?: string;
};

/**
 * Append-only record of completed downloads (JSON Lines).
 *
 * The whole file is read into memory once; membership checks never touch disk.
 * Each append writes and syncs one self-contained line, so a crash can at worst
 * leave a torn final line, which the next load reports and skips.
 *
 * Usage:
 *   const ledger = new CompletionLedger('downloaded.jsonl');
 *   const warnings = await ledger.load();
 *   if (!ledger.contains(key)) { ...; await ledger.append(entry); }
 */
export class CompletionLedger {
  private entries = new Map<string, LedgerEntry>();
  private writeChain: Promise<void> = Promise.resolve();
  /** The file ends in a torn line; the next write must start on a fresh one */
  private needsLeadingNewline = false;

  private readonly legacyDownloadDir: string;

  constructor(
    private readonly path: string,
    options: CompletionLedgerOptions = {},
  ) {
    this.legacyDownloadDir = options.legacyDownloadDir ?? join(dirname(path), 'downloads');
  }

  getPath(): string {
    return this.path;
  }

  /**
   * Load all records from disk, replacing what is in memory.
   *
   * @returns One warning per line that could not be parsed
   */
  async load(): Promise<LedgerCorruptionWarning[]> {
    this.entries.clear();
    this.needsLeadingNewline = false;

    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    this.needsLeadingNewline = content.length > 0 && !content.endsWith('\n');

    const warnings: LedgerCorruptionWarning[] = [];
    const lines = content.split('\n');

    lines.forEach((raw, index) => {
      const line = raw.trim();
      if (!line) return;

      const entry = this.parseLine(line, index + 1, warnings);
      if (!entry) return;

      const key = dedupKeyString(entry);
      // First record wins; a duplicate can only come from a manual edit
      if (!this.entries.has(key)) {
        this.entries.set(key, entry);
      }
    });

    return warnings;
  }

  contains(key: DedupKey): boolean {
    return this.entries.has(dedupKeyString(key));
  }

  get(key: DedupKey): LedgerEntry | undefined {
    return this.entries.get(dedupKeyString(key));
  }

  get size(): number {
    return this.entries.size;
  }

  list(): LedgerEntry[] {
    return [...this.entries.values()];
  }

  /**
   * Durably record a completed download.
   *
   * Appends are serialized, so two concurrent appends for one key produce a
   * single line.
   *
   * @returns false when the key was already recorded (nothing written)
   * @throws LedgerWriteError when the line could not be written
   */
  append(entry: LedgerEntry): Promise<boolean> {
    const result = this.writeChain.then(() => this.appendNow(entry));
    this.writeChain = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private async appendNow(entry: LedgerEntry): Promise<boolean> {
    const key = dedupKeyString(entry);
    if (this.entries.has(key)) {
      return false;
    }

    const parsed = LedgerEntrySchema.safeParse(entry);
    if (!parsed.success) {
      throw new LedgerWriteError(`Invalid ledger record: ${describeIssues(parsed.error)}`, this.path);
    }
    const record: LedgerEntry = parsed.data;
    const line = `${this.needsLeadingNewline ? '\n' : ''}${JSON.stringify(record)}\n`;

    try {
      await mkdir(dirname(this.path), { recursive: true });
      const handle = await open(this.path, 'a');
      try {
        await handle.appendFile(line, 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
    } catch (error) {
      // Part of the line may have reached the file
      this.needsLeadingNewline = true;
      throw new LedgerWriteError(`Failed to append to ledger ${this.path}: ${errorMessage(error)}`, this.path);
    }

    this.needsLeadingNewline = false;
    this.entries.set(key, record);
    return true;
  }

  private parseLine(line: string, lineNumber: number, warnings: LedgerCorruptionWarning[]): LedgerEntry | undefined {
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (error) {
      warnings.push(new LedgerCorruptionWarning(`Invalid JSON: ${errorMessage(error)}`, this.path, lineNumber));
      return undefined;
    }

    if (typeof json === 'object' && json !== null && 'program_title' in json) {
      const legacy = LegacyLedgerRecordSchema.safeParse(json);
      if (!legacy.success) {
        warnings.push(
          new LedgerCorruptionWarning(`Invalid legacy record: ${describeIssues(legacy.error)}`, this.path, lineNumber),
        );
        return undefined;
      }
      return fromLegacyRecord(legacy.data, this.legacyDownloadDir);
    }

    const result = LedgerEntrySchema.safeParse(json);
    if (!result.success) {
      warnings.push(new LedgerCorruptionWarning(`Invalid record: ${describeIssues(result.error)}`, this.path, lineNumber));
      return undefined;
    }

    return result.data;
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
