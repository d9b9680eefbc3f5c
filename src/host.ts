import { ForegroundSignal, SessionStatus } from './session';
import { createLogger, Logger } from './utils/logger';

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Ties a running session to the host process: while entered, SIGINT/SIGTERM
 * run the shutdown callback instead of killing the process mid-gesture.
 */
export class ProcessForeground implements ForegroundSignal {
  private readonly handlers = new Map<NodeJS.Signals, () => void>();
  private readonly logger: Logger;

  constructor(
    private readonly onSignal: (signal: NodeJS.Signals) => Promise<void>,
    logger: Logger = createLogger('host')
  ) {
    this.logger = logger;
  }

  enter(status: SessionStatus): void {
    if (this.handlers.size > 0) {
      return;
    }

    for (const signal of SHUTDOWN_SIGNALS) {
      const handler = (): void => {
        this.logger.info('Received signal, stopping session', { signal });
        this.onSignal(signal).catch(error => this.logger.error('Shutdown failed', error, { signal }));
      };
      this.handlers.set(signal, handler);
      process.once(signal, handler);
    }
    this.logger.debug('Holding process in foreground', { url: status.url });
  }

  exit(): void {
    for (const [signal, handler] of this.handlers) {
      process.off(signal, handler);
    }
    this.handlers.clear();
  }

  get active(): boolean {
    return this.handlers.size > 0;
  }
}
