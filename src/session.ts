import http from 'http';
import { InvalidPortError, SessionStartError } from './types';
import { errorCode, formatErrorForResponse } from './utils/error';
import { AsyncLock } from './utils/lock';
import { createLogger, Logger } from './utils/logger';
import { resolveLocalAddress } from './utils/network';

export const MIN_PORT = 1024;
export const MAX_PORT = 65535;
export const DEFAULT_PORT = 8080;
export const DEFAULT_HOST = '0.0.0.0';

const WILDCARD_HOSTS = new Set(['', '0.0.0.0', '::']);

export type SessionState = 'stopped' | 'starting' | 'running' | 'failed';

export interface SessionStatus {
  state: SessionState;
  port?: number;
  url?: string;
  lastError?: string;
}

/**
 * Host-side signal that keeps the process alive while a session runs.
 */
export interface ForegroundSignal {
  enter(status: SessionStatus): void;
  exit(): void;
}

export interface SessionControllerOptions {
  host?: string;
  foreground?: ForegroundSignal;
  addressResolver?: () => string | undefined;
  logger?: Logger;
}

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= MIN_PORT && port <= MAX_PORT;
}

function suggestionFor(error: unknown): string | undefined {
  const code = errorCode(error);
  if (code === 'EADDRINUSE') {
    return 'Another process is listening on this port; stop it or choose a different port';
  }
  if (code === 'EACCES') {
    return 'The process is not allowed to bind this address; choose a different host or port';
  }
  return undefined;
}

/**
 * Owns the one listening endpoint of the process. Transitions are serialized:
 * a start racing another start or a stop waits for it to finish.
 */
export class SessionLifecycleController {
  private readonly lock = new AsyncLock();
  private readonly host: string;
  private readonly foreground?: ForegroundSignal;
  private readonly addressResolver: () => string | undefined;
  private readonly logger: Logger;

  private server?: http.Server;
  private state: SessionState = 'stopped';
  private port?: number;
  private url?: string;
  private lastError?: string;

  constructor(
    private readonly listener: http.RequestListener,
    options: SessionControllerOptions = {}
  ) {
    this.host = options.host ?? DEFAULT_HOST;
    this.foreground = options.foreground;
    this.addressResolver = options.addressResolver ?? (() => resolveLocalAddress());
    this.logger = options.logger ?? createLogger('session');
  }

  async start(port: number): Promise<SessionStatus> {
    if (!isValidPort(port)) {
      throw new InvalidPortError(port);
    }

    return this.lock.run(async () => {
      if (this.state === 'running') {
        this.logger.info('Session already running', { port: this.port, url: this.url });
        return this.getStatus();
      }

      this.state = 'starting';
      this.lastError = undefined;
      const server = http.createServer(this.listener);

      try {
        await this.listen(server, port);
      } catch (error) {
        this.state = 'failed';
        this.lastError = formatErrorForResponse(error);
        this.logger.error('Failed to start session', error, { port, host: this.host });
        server.close();
        this.state = 'stopped';
        throw new SessionStartError(port, this.lastError, suggestionFor(error));
      }

      this.server = server;
      this.port = port;
      this.url = this.deriveUrl(port);
      this.state = 'running';
      this.foreground?.enter(this.getStatus());
      this.logger.info('Session started', { port, url: this.url });
      return this.getStatus();
    });
  }

  async stop(): Promise<void> {
    await this.lock.run(async () => {
      const server = this.server;
      if (this.state === 'stopped' || !server) {
        return;
      }

      await this.release(server);
      this.server = undefined;
      this.foreground?.exit();
      this.state = 'stopped';
      this.logger.info('Session stopped', { port: this.port });
      this.port = undefined;
      this.url = undefined;
    });
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  getServerUrl(): string | undefined {
    return this.state === 'running' ? this.url : undefined;
  }

  getStatus(): SessionStatus {
    return {
      state: this.state,
      port: this.port,
      url: this.getServerUrl(),
      lastError: this.lastError,
    };
  }

  private listen(server: http.Server, port: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error): void => {
        server.off('listening', onListening);
        reject(error);
      };
      const onListening = (): void => {
        server.off('error', onError);
        resolve();
      };
      server.once('error', onError);
      server.once('listening', onListening);
      server.listen(port, this.host);
    });
  }

  private release(server: http.Server): Promise<void> {
    return new Promise((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
      // close() alone waits on idle keep-alive sockets
      server.closeAllConnections();
    });
  }

  private deriveUrl(port: number): string {
    const address = WILDCARD_HOSTS.has(this.host) ? this.addressResolver() : this.host;
    const host = address ?? 'localhost';
    return `http://${host.includes(':') ? `[${host}]` : host}:${port}`;
  }
}
