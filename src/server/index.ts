/**
 * Server module exports
 */

export {
  CalendarRequestHandler,
  CORS_HEADERS,
  calendarFilename,
  textResponse,
  type CalendarResponse,
  type CalendarRequestHandlerDeps
} from './CalendarRequestHandler.js';
export { CalendarHttpServer } from './CalendarHttpServer.js';
