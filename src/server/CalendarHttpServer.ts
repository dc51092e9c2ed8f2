/**
 * HTTP server exposing the calendar feeds
 * GET /cal/{courseId}/{year}?curriculum={token}
 */

import { createServer, IncomingMessage, ServerResponse } from 'http';
import { URL } from 'url';
import { ServerConfig } from '../types/config.js';
import { CalendarRequestHandler, CalendarResponse, CORS_HEADERS, textResponse } from './CalendarRequestHandler.js';

const CALENDAR_ROUTE = /^\/cal\/([^/]+)\/([^/]+)\/?$/;

export class CalendarHttpServer {
  private server: ReturnType<typeof createServer> | null = null;
  private handler: CalendarRequestHandler;
  private config: ServerConfig;

  constructor(
    handler: CalendarRequestHandler,
    config: ServerConfig = { port: 8080, host: '0.0.0.0' }
  ) {
    this.handler = handler;
    this.config = config;
  }

  /**
   * Start listening
   */
  async start(): Promise<void> {
    if (this.server) {
      throw new Error('Calendar server is already running');
    }

    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch(error => {
        console.error('Error handling calendar request:', error);
        this.send(req, res, textResponse(500, 'Internal server error'));
      });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', reject);
        console.log(`Calendar server listening on ${this.config.host}:${this.getPort()}`);
        resolve();
      });
    });
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    return new Promise((resolve, reject) => {
      server.close(error => {
        this.server = null;
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Port the server is bound to, useful when configured with port 0
   */
  getPort(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.config.port;
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    // Only the path and query are read
    const url = new URL(req.url ?? '/', 'http://localhost');
    const match = CALENDAR_ROUTE.exec(url.pathname);

    if (!match) {
      this.send(req, res, textResponse(404, 'Not found'));
      return;
    }

    switch (req.method) {
      case 'OPTIONS':
        this.send(req, res, { statusCode: 204, headers: { ...CORS_HEADERS }, body: '' });
        return;
      case 'GET':
      case 'HEAD': {
        const response = await this.handler.handle({
          courseId: match[1],
          year: match[2],
          curriculum: url.searchParams.get('curriculum')
        });
        this.send(req, res, response);
        return;
      }
      default: {
        const response = textResponse(405, 'Method not allowed');
        response.headers['Allow'] = 'GET, HEAD, OPTIONS';
        this.send(req, res, response);
      }
    }
  }

  private send(req: IncomingMessage, res: ServerResponse, response: CalendarResponse): void {
    if (res.headersSent) {
      res.end();
      return;
    }

    const body = typeof response.body === 'string' ? Buffer.from(response.body, 'utf-8') : response.body;

    const headers = response.statusCode === 204
      ? response.headers
      : { ...response.headers, 'Content-Length': String(body.length) };

    res.writeHead(response.statusCode, headers);
    res.end(req.method === 'HEAD' ? undefined : body);
  }
}
