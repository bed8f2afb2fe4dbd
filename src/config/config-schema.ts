/**
 * Zod schemas for configuration validation
 *
 * The file schema accepts any subset of settings; the resolved schema is what
 * the rest of the program receives after defaults and CLI flags are applied.
 * Types are inferred from the schemas so they stay in sync.
 */

import { z } from 'zod';
import { NotificationLevelSchema } from '../notifications/notification-level';
import { QualityTierSchema } from '../types/quality-tier';

const CatalogSettingsSchema = z.object({
  baseUrl: z.url().describe('Catalog GraphQL endpoint'),
  requestConcurrency: z.number().int().min(1).max(50).describe('Parallel catalog requests per program'),
  requestTimeout: z.number().positive().describe('Catalog request timeout in seconds'),
});

const SubtitleSettingsSchema = z.object({
  preferredLanguage: z.string().min(1).describe('Subtitle track name to prefer, e.g. "is"'),
  metadataLanguage: z.string().min(1).describe('ISO 639-2 language tag written into the file, e.g. "isl"'),
});

const NotificationSettingsSchema = z.object({
  consoleMinLevel: NotificationLevelSchema.describe('Minimum notification level for console output'),
});

const OrganizeSettingsSchema = z.object({
  libraryDir: z.string().min(1).describe('Root of the Title/Season NN layout'),
  translations: z
    .record(z.string(), z.string().min(1))
    .describe('Foreign titles for programs whose files say "None", keyed by program title'),
});

const CommonSettingsSchema = z.object({
  downloadDir: z.string().min(1).describe('Directory to save downloaded episodes'),
  ledgerFile: z.string().min(1).describe('Path to the completion ledger (JSON Lines)'),
  quality: QualityTierSchema.describe('Requested quality tier'),
  concurrency: z.number().int().min(1).max(16).describe('Parallel episode downloads'),
  fetchTimeout: z.number().nonnegative().describe('ffmpeg timeout per episode in seconds, 0 for none'),
  minDuration: z.number().nonnegative().describe('Minimum duration in seconds of a downloaded file, 0 to skip'),
  audioOnly: z.boolean().describe('Keep only the audio track'),
});

/**
 * Settings as written in the YAML file
 */
export const ConfigFileSchema = CommonSettingsSchema.partial().extend({
  catalog: CatalogSettingsSchema.partial().optional(),
  subtitles: SubtitleSettingsSchema.partial().optional(),
  notifications: NotificationSettingsSchema.partial().optional(),
  organize: OrganizeSettingsSchema.partial().optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Fully resolved configuration; paths are absolute
 */
export const ResolvedConfigSchema = CommonSettingsSchema.extend({
  workDir: z.string().min(1),
  catalog: CatalogSettingsSchema,
  subtitles: SubtitleSettingsSchema,
  notifications: NotificationSettingsSchema,
  organize: OrganizeSettingsSchema,
});

export type ResolvedConfig = z.infer<typeof ResolvedConfigSchema>;

/**
 * Values that may come from the command line
 */
export type ConfigOverrides = Partial<Pick<ResolvedConfig, 'quality' | 'concurrency' | 'audioOnly'>>;

/**
 * Render zod issues as "path: message" lines
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`).join('\n');
}
