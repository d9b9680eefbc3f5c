import { ActionResult, DeviceInfo, ElementSelector, PageSource, UiDevice } from '../types';
import { AsyncLock } from '../utils/lock';
import { createLogger, Logger } from '../utils/logger';
import { ActionExecutor } from './actions';
import { SelectorResolver } from './selector';
import { TreeSnapshotBuilder } from './snapshot';
import { DEFAULT_POLL_INTERVAL_MS, DEFAULT_WAIT_TIMEOUT_MS, WaitEvaluator } from './wait';
import { pageSourceToXml } from './xml';

export interface AutomationEngineOptions {
  waitPollIntervalMs?: number;
  logger?: Logger;
}

/**
 * The single logical automation handle for a device. Every operation that
 * touches the device surface runs under one lock, in arrival order.
 */
export class AutomationEngine {
  private readonly lock = new AsyncLock();
  private readonly logger: Logger;
  private readonly resolver: SelectorResolver;
  private readonly snapshots: TreeSnapshotBuilder;
  private readonly actions: ActionExecutor;
  private readonly waits: WaitEvaluator;

  constructor(device: UiDevice, options: AutomationEngineOptions = {}) {
    this.logger = options.logger ?? createLogger('engine');
    this.resolver = new SelectorResolver(device, this.logger.child('selector'));
    this.snapshots = new TreeSnapshotBuilder(device, this.logger.child('snapshot'));
    this.actions = new ActionExecutor(device, this.resolver, this.logger.child('actions'));
    this.waits = new WaitEvaluator(
      this.resolver,
      task => this.lock.run(task),
      options.waitPollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
      this.logger.child('wait')
    );
  }

  dumpPage(): Promise<PageSource> {
    return this.lock.run(() => this.snapshots.build());
  }

  async dumpXml(): Promise<string> {
    return pageSourceToXml(await this.dumpPage());
  }

  click(selector: ElementSelector): Promise<ActionResult> {
    return this.lock.run(() => this.actions.click(selector));
  }

  input(selector: ElementSelector, text: string, clearFirst = true): Promise<ActionResult> {
    return this.lock.run(() => this.actions.input(selector, text, clearFirst));
  }

  scroll(direction: string, steps = 1, selector?: ElementSelector): Promise<ActionResult> {
    return this.lock.run(() => this.actions.scroll(direction, steps, selector));
  }

  // Not wrapped: the evaluator takes the lock per poll.
  wait(selector: ElementSelector, timeoutMs = DEFAULT_WAIT_TIMEOUT_MS, condition = 'visible'): Promise<ActionResult> {
    return this.waits.wait(selector, timeoutMs, condition);
  }

  pressBack(): Promise<ActionResult> {
    return this.lock.run(() => this.actions.pressBack());
  }

  pressHome(): Promise<ActionResult> {
    return this.lock.run(() => this.actions.pressHome());
  }

  pressRecent(): Promise<ActionResult> {
    return this.lock.run(() => this.actions.pressRecent());
  }

  deviceInfo(): Promise<DeviceInfo> {
    return this.lock.run(() => this.actions.deviceInfo());
  }
}
