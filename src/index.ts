/**
 * Main entry point for the lecture calendar feed server
 */

import { pathToFileURL } from 'url';
import { OpenDataTimetableSource } from './adapters/OpenDataTimetableSource.js';
import { TimetableSource } from './interfaces/TimetableSource.js';
import { CalendarHttpServer, CalendarRequestHandler } from './server/index.js';
import { CalendarCache } from './services/CalendarCache.js';
import { CalendarSynthesizer } from './services/CalendarSynthesizer.js';
import { ConfigManager } from './services/ConfigManager.js';
import { CourseCatalog } from './services/CourseCatalog.js';
import { RequestValidator } from './services/RequestValidator.js';
import { CourseDirectory } from './interfaces/CourseDirectory.js';
import { AppConfig } from './types/config.js';
import { Clock, systemClock } from './utils/clock.js';

export interface AppState {
  config: AppConfig;
  cache: CalendarCache;
  server: CalendarHttpServer;
  isShuttingDown: boolean;
}

export interface ServiceOverrides {
  directory?: CourseDirectory;
  timetableSource?: TimetableSource;
  clock?: Clock;
}

/**
 * Wire the calendar services together. Collaborators can be replaced, which
 * is how tests run the whole stack without the network.
 */
export async function initializeServices(config: AppConfig, overrides: ServiceOverrides = {}): Promise<AppState> {
  const clock = overrides.clock ?? systemClock;

  const directory = overrides.directory ?? await CourseCatalog.fromFile(config.data.coursesPath);
  if (directory instanceof CourseCatalog) {
    console.log(`Loaded ${directory.size} courses from ${config.data.coursesPath}`);
  }

  const cache = new CalendarCache(config.cache, clock);
  const handler = new CalendarRequestHandler({
    validator: new RequestValidator(directory),
    cache,
    timetableSource: overrides.timetableSource ?? new OpenDataTimetableSource(config.timetable),
    synthesizer: new CalendarSynthesizer({ clock })
  });
  const server = new CalendarHttpServer(handler, config.server);

  return {
    config,
    cache,
    server,
    isShuttingDown: false
  };
}

/**
 * Stop accepting requests and release the cache timer
 */
export async function shutdown(state: AppState): Promise<void> {
  if (state.isShuttingDown) {
    return;
  }
  state.isShuttingDown = true;

  try {
    await state.server.stop();
  } finally {
    const stats = state.cache.getStats();
    console.log(`Calendar cache: ${stats.hits} hits, ${stats.misses} misses, ${stats.entries} entries`);
    state.cache.close();
  }
}

/**
 * Set up graceful shutdown handlers
 */
function setupShutdownHandlers(state: AppState): void {
  const onSignal = (signal: string) => {
    console.log(`Received ${signal}, shutting down gracefully...`);
    shutdown(state)
      .then(() => {
        console.log('Shutdown completed successfully');
        process.exit(0);
      })
      .catch(error => {
        console.error('Error during shutdown:', error);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));
}

async function main(): Promise<void> {
  console.log('Lecture calendar server starting...');

  const configManager = new ConfigManager();
  const config = await configManager.loadConfig();
  console.log(`Configuration loaded from ${configManager.getConfigPath()}`);

  const state = await initializeServices(config);
  await state.server.start();
  setupShutdownHandlers(state);
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error) => {
    console.error('Failed to start server:', error);
    process.exit(1);
  });
}
