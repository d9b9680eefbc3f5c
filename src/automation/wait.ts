import { ActionResult, ElementSelector, ErrorCodes, WAIT_CONDITIONS, WaitCondition } from '../types';
import { createLogger, Logger } from '../utils/logger';
import { createActionResult } from './actions';
import { Attr, nodeFlag } from './platform-node';
import { describeSelector, isValidSelector, Resolution, SelectorResolver } from './selector';

export const DEFAULT_WAIT_TIMEOUT_MS = 5000;
export const DEFAULT_POLL_INTERVAL_MS = 300;

// Runs one unit of device work under the engine's device lock.
export type ExclusiveRunner = <T>(task: () => Promise<T>) => Promise<T>;

export function parseCondition(value: string): WaitCondition | undefined {
  const normalized = value.trim().toLowerCase();
  return WAIT_CONDITIONS.find(condition => condition === normalized);
}

export function isConditionMet(condition: WaitCondition, resolution: Resolution): boolean {
  switch (condition) {
    case 'visible':
      return resolution.status === 'found';
    case 'gone':
      return resolution.status === 'missing';
    case 'clickable':
      return resolution.status === 'found' && nodeFlag(resolution.node, Attr.CLICKABLE);
  }
}

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export class WaitEvaluator {
  private readonly logger: Logger;

  constructor(
    private readonly resolver: SelectorResolver,
    private readonly exclusive: ExclusiveRunner,
    private readonly pollIntervalMs = DEFAULT_POLL_INTERVAL_MS,
    logger: Logger = createLogger('wait')
  ) {
    this.logger = logger;
  }

  /**
   * Polls the selector until the condition holds or the timeout elapses. The
   * device lock is held for a single resolution at a time, never across a sleep.
   */
  async wait(
    selector: ElementSelector,
    timeoutMs = DEFAULT_WAIT_TIMEOUT_MS,
    condition = 'visible'
  ): Promise<ActionResult> {
    if (!isValidSelector(selector)) {
      return createActionResult(false, 'Invalid selector', { errorCode: ErrorCodes.INVALID_SELECTOR });
    }

    const parsed = parseCondition(condition);
    if (!parsed) {
      this.logger.warn('Unknown wait condition', { condition });
      return createActionResult(false, `Unknown wait condition: ${condition}`, {
        errorCode: ErrorCodes.OPERATION_FAILED,
      });
    }

    const description = describeSelector(selector);
    const deadline = Date.now() + Math.max(0, timeoutMs);
    let polls = 0;
    let elementFound = false;

    for (;;) {
      const resolution = await this.exclusive(() => this.resolver.resolve(selector));
      polls += 1;
      elementFound = resolution.status === 'found';

      if (isConditionMet(parsed, resolution)) {
        this.logger.debug('Wait condition met', { selector: description, condition: parsed, polls });
        return createActionResult(true, `Condition '${parsed}' met`, { elementFound });
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        break;
      }
      await sleep(Math.min(this.pollIntervalMs, remaining));
    }

    this.logger.debug('Wait timed out', { selector: description, condition: parsed, polls, timeoutMs });
    return createActionResult(false, `Timed out after ${timeoutMs}ms waiting for condition '${parsed}'`, {
      elementFound,
      errorCode: ErrorCodes.TIMEOUT,
    });
  }
}
