/**
 * Persisted GraphQL queries understood by the catalog
 */
export const PERSISTED_QUERIES = {
  /** Program with episode stubs (id, title, firstrun) */
  getEpisode: 'f3f957a3a577be001eccf93a76cf2ae1b6d10c95e67305c56e4273279115bb93',
  /** Program with one fully described episode (file, duration, subtitles) */
  getSerie: 'afd9cf0c67f1ebed0a981b72ee127a5a152eb90f4adb2b3bd3e6c1ec185a2dd3',
} as const;

export type PersistedQuery = keyof typeof PERSISTED_QUERIES;

/**
 * Build a GET url for a persisted query
 */
export function buildQueryUrl(baseUrl: string, operationName: PersistedQuery, variables: object): string {
  const url = new URL(baseUrl);
  url.searchParams.set('operationName', operationName);
  url.searchParams.set('variables', JSON.stringify(variables));
  url.searchParams.set(
    'extensions',
    JSON.stringify({ persistedQuery: { version: 1, sha256Hash: PERSISTED_QUERIES[operationName] } }),
  );
  return url.toString();
}

export function programEpisodesUrl(baseUrl: string, programId: number): string {
  return buildQueryUrl(baseUrl, 'getEpisode', { programID: programId });
}

export function episodeDetailUrl(baseUrl: string, programId: number, episodeId: string): string {
  return buildQueryUrl(baseUrl, 'getSerie', { episodeID: [episodeId], programID: programId });
}
