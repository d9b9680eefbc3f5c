import { IncomingMessage, RequestListener, ServerResponse } from 'http';
import { ZodError, ZodType, ZodTypeDef } from 'zod';
import pkg from '../package.json';
import { createActionResult } from './automation/actions';
import { AutomationEngine } from './automation/engine';
import { DEFAULT_POLL_INTERVAL_MS } from './automation/wait';
import { ForegroundSignal, SessionLifecycleController } from './session';
import {
  ActionResult,
  ClickRequestSchema,
  ErrorCodes,
  InputRequestSchema,
  ScrollRequestSchema,
  UiDevice,
  WaitRequestSchema,
} from './types';
import { formatErrorForResponse } from './utils/error';
import { createLogger, Logger } from './utils/logger';
import { toWireActionResult, toWireDeviceInfo, toWirePageSource } from './utils/wire';

const MAX_BODY_BYTES = 1024 * 1024;

type JsonObject = Record<string, unknown>;

class RequestError extends Error {
  constructor(
    readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'RequestError';
  }
}

function sendJson(response: ServerResponse, statusCode: number, body: object): void {
  response.statusCode = statusCode;
  response.setHeader('Content-Type', 'application/json; charset=utf-8');
  response.end(JSON.stringify(body));
}

function sendHtml(response: ServerResponse, html: string): void {
  response.statusCode = 200;
  response.setHeader('Content-Type', 'text/html; charset=utf-8');
  response.end(html);
}

function sendXml(response: ServerResponse, xml: string): void {
  response.statusCode = 200;
  response.setHeader('Content-Type', 'application/xml; charset=utf-8');
  response.end(xml);
}

function sendResult(response: ServerResponse, result: ActionResult): void {
  sendJson(response, 200, toWireActionResult(result));
}

function sendServiceError(response: ServerResponse, statusCode: number, message: string): void {
  sendJson(
    response,
    statusCode,
    toWireActionResult(createActionResult(false, message, { errorCode: ErrorCodes.SERVICE_ERROR }))
  );
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readJsonBody(request: IncomingMessage): Promise<JsonObject> {
  return await new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    request.on('data', (chunk: Buffer | string) => {
      const value = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
      size += value.byteLength;
      if (size > MAX_BODY_BYTES) {
        reject(new RequestError(413, 'Request body too large'));
        return;
      }
      chunks.push(value);
    });

    request.on('error', reject);
    request.on('end', () => {
      if (chunks.length === 0) {
        resolve({});
        return;
      }
      try {
        const parsed: unknown = JSON.parse(Buffer.concat(chunks).toString('utf8'));
        if (!isJsonObject(parsed)) {
          reject(new RequestError(400, 'JSON body must be an object'));
          return;
        }
        resolve(parsed);
      } catch (error) {
        reject(new RequestError(400, `Invalid JSON body: ${formatErrorForResponse(error)}`));
      }
    });
  });
}

async function readRequest<T>(request: IncomingMessage, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
  const body = await readJsonBody(request);
  try {
    return schema.parse(body);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new RequestError(400, `Invalid request: ${formatErrorForResponse(error)}`);
    }
    throw error;
  }
}

type RouteHandler = (request: IncomingMessage, response: ServerResponse) => Promise<void>;

const ENDPOINTS: { method: string; path: string; description: string }[] = [
  { method: 'GET', path: '/ui/dump', description: 'Snapshot of the current UI tree as JSON' },
  { method: 'GET', path: '/ui/dump/xml', description: 'Snapshot of the current UI tree as uiautomator XML' },
  { method: 'POST', path: '/ui/click', description: 'Tap the element matching {selector}' },
  { method: 'POST', path: '/ui/input', description: 'Type {text} into the element matching {selector}' },
  { method: 'POST', path: '/ui/scroll', description: 'Swipe {direction} on the screen or inside {selector}' },
  { method: 'POST', path: '/ui/wait', description: 'Wait up to {timeout} ms for {condition} on {selector}' },
  { method: 'POST', path: '/device/back', description: 'Press the back key' },
  { method: 'POST', path: '/device/home', description: 'Press the home key' },
  { method: 'POST', path: '/device/recent', description: 'Open recent apps' },
  { method: 'GET', path: '/device/info', description: 'Screen size, API level, manufacturer, model, version' },
  { method: 'GET', path: '/health', description: 'Liveness probe' },
];

const INDEX_HTML = `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <title>UI Automator Bridge</title>
    <style>
      body { font-family: system-ui, sans-serif; margin: 2rem; color: #1f2933; }
      code { background: #f0f4f8; padding: 0 0.25rem; border-radius: 3px; }
      td { padding: 0.25rem 1rem 0.25rem 0; }
    </style>
  </head>
  <body>
    <h1>UI Automator Bridge</h1>
    <p>Version ${pkg.version}. JSON bodies use snake_case keys.</p>
    <table>
      ${ENDPOINTS.map(
        endpoint =>
          `<tr><td><code>${endpoint.method}</code></td><td><code>${endpoint.path}</code></td><td>${endpoint.description}</td></tr>`
      ).join('\n      ')}
    </table>
  </body>
</html>
`;

export interface AutomationHttpServerOptions {
  isSessionRunning: () => boolean;
  version?: string;
  logger?: Logger;
}

/**
 * HTTP front end over the automation engine. Transport concerns only: body
 * parsing, schema validation, status codes and snake_case serialization.
 */
export class AutomationHttpServer {
  private readonly routes: Map<string, RouteHandler>;
  private readonly logger: Logger;
  private readonly version: string;

  constructor(
    private readonly engine: AutomationEngine,
    private readonly options: AutomationHttpServerOptions
  ) {
    this.logger = options.logger ?? createLogger('http');
    this.version = options.version ?? pkg.version;
    this.routes = new Map<string, RouteHandler>([
      ['GET /', async (_request, response) => sendHtml(response, INDEX_HTML)],
      [
        'GET /health',
        async (_request, response) =>
          sendJson(response, 200, { status: 'healthy', timestamp: Date.now(), version: this.version }),
      ],
      ['GET /ui/dump', async (_request, response) => sendJson(response, 200, toWirePageSource(await this.engine.dumpPage()))],
      ['GET /ui/dump/xml', async (_request, response) => sendXml(response, await this.engine.dumpXml())],
      [
        'POST /ui/click',
        async (request, response) => {
          const body = await readRequest(request, ClickRequestSchema);
          sendResult(response, await this.engine.click(body.selector));
        },
      ],
      [
        'POST /ui/input',
        async (request, response) => {
          const body = await readRequest(request, InputRequestSchema);
          sendResult(response, await this.engine.input(body.selector, body.text, body.clear_first));
        },
      ],
      [
        'POST /ui/scroll',
        async (request, response) => {
          const body = await readRequest(request, ScrollRequestSchema);
          sendResult(response, await this.engine.scroll(body.direction, body.steps, body.selector));
        },
      ],
      [
        'POST /ui/wait',
        async (request, response) => {
          const body = await readRequest(request, WaitRequestSchema);
          sendResult(response, await this.engine.wait(body.selector, body.timeout, body.condition));
        },
      ],
      ['POST /device/back', async (_request, response) => sendResult(response, await this.engine.pressBack())],
      ['POST /device/home', async (_request, response) => sendResult(response, await this.engine.pressHome())],
      ['POST /device/recent', async (_request, response) => sendResult(response, await this.engine.pressRecent())],
      [
        'GET /device/info',
        async (_request, response) => sendJson(response, 200, toWireDeviceInfo(await this.engine.deviceInfo())),
      ],
    ]);
  }

  readonly handle: RequestListener = async (request, response) => {
    const method = request.method ?? 'GET';
    const pathname = request.url ? new URL(request.url, 'http://localhost').pathname : '/';
    const route = this.routes.get(`${method} ${pathname}`);

    if (!route) {
      sendServiceError(response, 404, `Unknown endpoint: ${method} ${pathname}`);
      return;
    }

    if (!this.options.isSessionRunning()) {
      sendServiceError(response, 503, 'Automation session is not running');
      return;
    }

    const startedAt = Date.now();
    try {
      await route(request, response);
      this.logger.debug('Request handled', { method, path: pathname, durationMs: Date.now() - startedAt });
    } catch (error) {
      if (error instanceof RequestError) {
        this.logger.warn('Rejected request', { method, path: pathname, reason: error.message });
        sendServiceError(response, error.statusCode, error.message);
        return;
      }
      this.logger.error('Request failed', error, { method, path: pathname });
      sendServiceError(response, 500, formatErrorForResponse(error));
    }
  };
}

export interface AutomationServiceOptions {
  host?: string;
  waitPollIntervalMs?: number;
  foreground?: ForegroundSignal;
  addressResolver?: () => string | undefined;
  logger?: Logger;
}

export interface AutomationService {
  engine: AutomationEngine;
  http: AutomationHttpServer;
  session: SessionLifecycleController;
}

// Wires one engine, its HTTP front end and the session that serves it.
export function createAutomationService(device: UiDevice, options: AutomationServiceOptions = {}): AutomationService {
  const logger = options.logger ?? createLogger('service');
  const engine = new AutomationEngine(device, {
    waitPollIntervalMs: options.waitPollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
    logger: logger.child('engine'),
  });

  const httpServer = new AutomationHttpServer(engine, {
    isSessionRunning: (): boolean => session.isRunning(),
    logger: logger.child('http'),
  });
  const session = new SessionLifecycleController(httpServer.handle, {
    host: options.host,
    foreground: options.foreground,
    addressResolver: options.addressResolver,
    logger: logger.child('session'),
  });

  return { engine, http: httpServer, session };
}

export { AutomationEngine } from './automation/engine';
export { SessionLifecycleController } from './session';
export type { ForegroundSignal, SessionStatus, SessionState } from './session';
export * from './types';
