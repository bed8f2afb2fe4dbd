/**
 * Zod schemas for catalog GraphQL responses
 *
 * Only the fields the downloader reads are declared; everything else in the
 * payload is ignored. A response that fails these schemas never reaches the
 * orchestrator.
 */

import { z } from 'zod';

const IdSchema = z.union([z.string().min(1), z.number().int()]).transform((id) => String(id));

/** Blank strings count as absent */
const OptionalTextSchema = z
  .string()
  .nullish()
  .transform((value) => value?.trim() || undefined);

const EpisodeSummarySchema = z.object({
  id: IdSchema,
  title: OptionalTextSchema,
  firstrun: OptionalTextSchema,
});

const SubtitleSchema = z.object({
  name: z.string(),
  value: z.string().min(1),
});

const EpisodeDetailSchema = EpisodeSummarySchema.extend({
  duration: z.number().nonnegative().nullish(),
  file: z.string().nullish(),
  subtitles: z.array(SubtitleSchema).nullish(),
});

const ProgramSchema = z.object({
  id: IdSchema,
  title: z.string().min(1),
  foreign_title: OptionalTextSchema,
  short_description: z.string().nullish(),
  description: z.string().nullish(),
  episodes: z.array(EpisodeSummarySchema),
});

/**
 * Answer to the program-episodes query: the program with episode stubs
 */
export const ProgramEpisodesResponseSchema = z.object({
  data: z.object({
    Program: ProgramSchema.nullable(),
  }),
});

/**
 * Answer to the single-episode query: the program with exactly the requested episode
 */
export const EpisodeDetailResponseSchema = z.object({
  data: z.object({
    Program: z
      .object({
        episodes: z.array(EpisodeDetailSchema),
      })
      .nullable(),
  }),
});

export type ProgramPayload = z.infer<typeof ProgramSchema>;

export type EpisodeDetailPayload = z.infer<typeof EpisodeDetailSchema>;
