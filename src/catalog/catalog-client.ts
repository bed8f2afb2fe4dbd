import type { z } from 'zod';
import { CatalogFetchError, CatalogParseError, errorMessage } from '../errors/custom-errors';
import { NotificationLevel, type Notifier } from '../notifications/notifier';
import { mapConcurrent } from '../queue/worker-pool';
import { parseMasterPlaylist } from '../stream/hls-manifest';
import type { Episode, Program, ProgramId } from '../types/catalog.types';
import type { StreamManifest } from '../types/stream.types';
import {
  type EpisodeDetailPayload,
  EpisodeDetailResponseSchema,
  type ProgramPayload,
  ProgramEpisodesResponseSchema,
} from './catalog-schema';
import { episodeDetailUrl, programEpisodesUrl } from './catalog-urls';

/**
 * What the download orchestrator needs from the catalog
 */
export type CatalogClient = {
  /**
   * Fetch a program with all of its episodes
   * @throws CatalogFetchError
   */
  fetchProgram(programId: ProgramId): Promise<Program>;

  /**
   * Fetch and parse the stream manifest of an episode
   * @throws CatalogFetchError
   */
  fetchStreamManifest(episode: Episode): Promise<StreamManifest>;
};

export type GraphqlCatalogClientOptions = {
  baseUrl: string;
  /** Parallel episode-detail requests while expanding one program */
  requestConcurrency: number;
  /** Per-request timeout in seconds */
  requestTimeout: number;
  notifier: Notifier;
  /** Injectable for tests; the global fetch by default */
  fetchImpl?: typeof fetch;
};

const REQUEST_HEADERS = {
  Accept: 'application/json',
  'User-Agent': 'reelkeeper',
};

/**
 * Catalog client speaking the persisted-query GraphQL API over HTTP GET.
 *
 * A program listing only carries episode stubs, so each episode is fetched
 * once more to learn its stream location, duration and subtitles.
 */
export class GraphqlCatalogClient implements CatalogClient {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: GraphqlCatalogClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetchProgram(programId: ProgramId): Promise<Program> {
    const numericId = parseProgramId(programId);

    const listing = await this.requestJson(
      programEpisodesUrl(this.options.baseUrl, numericId),
      ProgramEpisodesResponseSchema,
      programId,
    );
    const program = listing.data.Program;
    if (!program) {
      throw new CatalogFetchError(`Program ${programId} not found`, programId);
    }

    const details = await mapConcurrent(program.episodes, this.options.requestConcurrency, (stub) =>
      this.fetchEpisodeDetail(numericId, programId, stub.id),
    );

    const episodes = details.map((outcome): Episode => {
      if (outcome.ok) {
        return toEpisode(programId, outcome.value);
      }
      // Keep the stub: it still dedups, and fails on its own when downloaded
      this.options.notifier.notify(
        NotificationLevel.WARNING,
        `Episode ${outcome.item.id} of program ${programId}: ${errorMessage(outcome.error)}`,
      );
      return toEpisode(programId, outcome.item);
    });

    return toProgram(program, episodes);
  }

  async fetchStreamManifest(episode: Episode): Promise<StreamManifest> {
    if (!episode.manifestUrl) {
      throw new CatalogFetchError(`Episode ${episode.id} has no stream location`, episode.programId, episode.id);
    }

    const body = await this.request(episode.manifestUrl, episode.programId, episode.id, 'text');
    const { manifest, unmatched } = parseMasterPlaylist(body, episode.manifestUrl);

    for (const variant of unmatched) {
      this.options.notifier.notify(NotificationLevel.DEBUG, `Episode ${episode.id}: ignoring variant ${variant}`);
    }

    return manifest;
  }

  private async fetchEpisodeDetail(
    numericId: number,
    programId: ProgramId,
    episodeId: string,
  ): Promise<EpisodeDetailPayload> {
    const response = await this.requestJson(
      episodeDetailUrl(this.options.baseUrl, numericId, episodeId),
      EpisodeDetailResponseSchema,
      programId,
      episodeId,
    );

    const detail = response.data.Program?.episodes.find((candidate) => candidate.id === episodeId);
    if (!detail) {
      throw new CatalogFetchError(`Episode ${episodeId} not found`, programId, episodeId);
    }
    return detail;
  }

  private async requestJson<S extends z.ZodType>(
    url: string,
    schema: S,
    programId: ProgramId,
    episodeId?: string,
  ): Promise<z.output<S>> {
    const body = await this.request(url, programId, episodeId, 'json');

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (error) {
      throw new CatalogParseError(`Malformed JSON from catalog: ${errorMessage(error)}`, programId, episodeId);
    }

    const result = schema.safeParse(json);
    if (!result.success) {
      const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new CatalogParseError(`Unexpected catalog response: ${details}`, programId, episodeId);
    }
    return result.data;
  }

  private async request(
    url: string,
    programId: ProgramId,
    episodeId: string | undefined,
    kind: 'json' | 'text',
  ): Promise<string> {
    let response: Awaited<ReturnType<typeof fetch>>;
    try {
      response = await this.fetchImpl(url, {
        headers: kind === 'json' ? REQUEST_HEADERS : { 'User-Agent': REQUEST_HEADERS['User-Agent'] },
        signal: AbortSignal.timeout(this.options.requestTimeout * 1000),
      });
    } catch (error) {
      throw new CatalogFetchError(`Request to ${url} failed: ${errorMessage(error)}`, programId, episodeId);
    }

    if (!response.ok) {
      throw new CatalogFetchError(`HTTP ${response.status} ${response.statusText} from ${url}`, programId, episodeId);
    }

    try {
      return await response.text();
    } catch (error) {
      throw new CatalogFetchError(`Reading response from ${url} failed: ${errorMessage(error)}`, programId, episodeId);
    }
  }
}

/**
 * Program ids are positive integers on the wire
 *
 * @throws CatalogFetchError for anything else, before a request is made
 */
export function parseProgramId(programId: ProgramId): number {
  if (!/^\d+$/.test(programId) || Number(programId) === 0) {
    throw new CatalogFetchError(`Invalid program id "${programId}"`, programId);
  }
  return Number(programId);
}

function toEpisode(programId: ProgramId, payload: EpisodeDetailPayload | ProgramPayload['episodes'][number]): Episode {
  const detail: Partial<EpisodeDetailPayload> = payload;
  return {
    id: payload.id,
    programId,
    title: payload.title ?? undefined,
    firstrun: payload.firstrun ?? undefined,
    duration: detail.duration ?? undefined,
    manifestUrl: detail.file ?? undefined,
    subtitles: (detail.subtitles ?? []).map((track) => ({ name: track.name, url: track.value })),
  };
}

function toProgram(payload: ProgramPayload, episodes: Episode[]): Program {
  return {
    id: payload.id,
    title: payload.title,
    foreignTitle: payload.foreign_title ?? undefined,
    shortDescription: payload.short_description ?? payload.description ?? undefined,
    episodes,
  };
}
