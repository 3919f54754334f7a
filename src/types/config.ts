/**
 * Configuration types
 */

export interface StorageConfig {
  dataDir: string;
  eventsFile: string;
  categoriesFile: string;
  similarWordsFile: string;
}

export interface CalendarConfig {
  /** IANA zone used to assign events to days */
  timeZone: string;
  productId: string;
  includeUid: boolean;
}

export interface ServerConfig {
  name: string;
  version: string;
}

export interface AppConfig {
  storage: StorageConfig;
  calendar: CalendarConfig;
  server: ServerConfig;
}

export type StorageFileKey = Exclude<keyof StorageConfig, 'dataDir'>;

export interface ConfigValidationError {
  field: string;
  message: string;
  value?: unknown;
}
