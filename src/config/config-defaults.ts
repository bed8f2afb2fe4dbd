import { NotificationLevel } from '../notifications/notification-level';
import type { QualityTier } from '../types/quality-tier';

export const DEFAULT_CONFIG_FILE = 'reelkeeper.yaml';

export const DEFAULT_CATALOG_URL = 'https://spilari.nyr.ruv.is/gql/';

export type DefaultConfig = {
  downloadDir: string;
  ledgerFile: string;
  quality: QualityTier;
  concurrency: number;
  fetchTimeout: number;
  minDuration: number;
  audioOnly: boolean;

  catalog: {
    baseUrl: string;
    requestConcurrency: number;
    requestTimeout: number;
  };

  subtitles: {
    preferredLanguage: string;
    metadataLanguage: string;
  };

  notifications: {
    consoleMinLevel: NotificationLevel;
  };

  organize: {
    libraryDir: string;
    translations: Record<string, string>;
  };
};

/**
 * Relative paths are resolved against the work directory
 */
export const defaults: DefaultConfig = {
  downloadDir: 'downloads',
  ledgerFile: 'downloaded.jsonl',
  quality: '1080p',
  concurrency: 1,
  fetchTimeout: 0,
  minDuration: 0,
  audioOnly: false,
  catalog: {
    baseUrl: DEFAULT_CATALOG_URL,
    requestConcurrency: 10,
    requestTimeout: 30,
  },
  subtitles: {
    preferredLanguage: 'is',
    metadataLanguage: 'isl',
  },
  notifications: {
    consoleMinLevel: NotificationLevel.INFO,
  },
  organize: {
    libraryDir: 'library',
    translations: {},
  },
};
