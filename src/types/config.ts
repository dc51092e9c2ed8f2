import { CacheConfig } from './cache.js';

/**
 * Configuration types for the calendar feed server
 */

export interface ServerConfig {
  port: number;
  host: string;
}

export interface TimetableConfig {
  path: string;
  timezone: string;
  requestTimeout: number; // milliseconds
  maxRetries: number;
  retryDelay: number; // milliseconds before the first retry, doubled each time
}

export interface DataConfig {
  coursesPath: string;
}

export interface AppConfig {
  server: ServerConfig;
  cache: CacheConfig;
  timetable: TimetableConfig;
  data: DataConfig;
}

export interface ConfigValidationError {
  field: string;
  message: string;
  value?: unknown;
}
