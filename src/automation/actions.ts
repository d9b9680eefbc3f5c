import {
  ActionResult,
  Bounds,
  DeviceInfo,
  ElementSelector,
  ErrorCode,
  ErrorCodes,
  HardwareKey,
  Point,
  SCROLL_DIRECTIONS,
  ScreenSize,
  ScrollDirection,
  UiDevice,
} from '../types';
import { boundsHeight, boundsWidth, centerOf } from '../utils/bounds';
import { errorMessage } from '../utils/error';
import { createLogger, Logger } from '../utils/logger';
import { Attr, nodeAttribute, nodeBounds } from './platform-node';
import { describeSelector, Resolution, SelectorResolver } from './selector';

export const SCREEN_SWIPE_STEPS = 10;
export const CONTAINER_SWIPE_STEPS = 10;
// upper bound on container swipes per scroll request; the device lock is held throughout
export const MAX_CONTAINER_SWIPES = 50;
// container swipes keep this fraction of the extent clear at each end
const CONTAINER_EDGE_MARGIN = 0.1;

export function createActionResult(
  success: boolean,
  message: string,
  options: { elementFound?: boolean; errorCode?: ErrorCode } = {}
): ActionResult {
  return {
    success,
    message,
    elementFound: options.elementFound ?? false,
    errorCode: options.errorCode,
    timestamp: Date.now(),
  };
}

export function parseDirection(value: string): ScrollDirection | undefined {
  const normalized = value.trim().toLowerCase();
  return SCROLL_DIRECTIONS.find(direction => direction === normalized);
}

/**
 * Full-screen swipe along the screen's center line between its thirds. The
 * direction names the way the finger travels.
 */
export function screenSwipePath(direction: ScrollDirection, size: ScreenSize): { from: Point; to: Point } {
  const midX = Math.floor(size.width / 2);
  const midY = Math.floor(size.height / 2);
  const oneThirdX = Math.floor(size.width / 3);
  const twoThirdsX = Math.floor((size.width * 2) / 3);
  const oneThirdY = Math.floor(size.height / 3);
  const twoThirdsY = Math.floor((size.height * 2) / 3);

  switch (direction) {
    case 'up':
      return { from: { x: midX, y: twoThirdsY }, to: { x: midX, y: oneThirdY } };
    case 'down':
      return { from: { x: midX, y: oneThirdY }, to: { x: midX, y: twoThirdsY } };
    case 'left':
      return { from: { x: twoThirdsX, y: midY }, to: { x: oneThirdX, y: midY } };
    case 'right':
      return { from: { x: oneThirdX, y: midY }, to: { x: twoThirdsX, y: midY } };
  }
}

/**
 * Swipe across 80% of a container's extent. Here the direction names the way
 * the content moves into view: `down` reveals what is below, so the finger
 * travels up.
 */
export function containerSwipePath(direction: ScrollDirection, bounds: Bounds): { from: Point; to: Point } {
  const center = centerOf(bounds);
  const insetX = Math.floor(boundsWidth(bounds) * CONTAINER_EDGE_MARGIN);
  const insetY = Math.floor(boundsHeight(bounds) * CONTAINER_EDGE_MARGIN);
  const near = { x: bounds.left + insetX, y: bounds.top + insetY };
  const far = { x: bounds.right - insetX, y: bounds.bottom - insetY };

  switch (direction) {
    case 'up':
      return { from: { x: center.x, y: near.y }, to: { x: center.x, y: far.y } };
    case 'down':
      return { from: { x: center.x, y: far.y }, to: { x: center.x, y: near.y } };
    case 'left':
      return { from: { x: near.x, y: center.y }, to: { x: far.x, y: center.y } };
    case 'right':
      return { from: { x: far.x, y: center.y }, to: { x: near.x, y: center.y } };
  }
}

const KEY_LABELS: Record<HardwareKey, string> = {
  back: 'Back',
  home: 'Home',
  recent: 'Recent apps',
};

/**
 * Synthetic interactions against the live device. Every outcome, including
 * platform faults, comes back as an ActionResult; nothing is retried.
 */
export class ActionExecutor {
  private readonly logger: Logger;

  constructor(
    private readonly device: UiDevice,
    private readonly resolver: SelectorResolver,
    logger: Logger = createLogger('actions')
  ) {
    this.logger = logger;
  }

  async click(selector: ElementSelector): Promise<ActionResult> {
    const resolution = await this.resolver.resolve(selector);
    if (resolution.status !== 'found') {
      return this.resolutionFailure(resolution, selector);
    }

    try {
      const target = centerOf(nodeBounds(resolution.node));
      this.logger.debug('Tapping element', { selector: describeSelector(selector), ...target });
      const acknowledged = await this.device.tap(target);
      return acknowledged
        ? createActionResult(true, 'Element clicked successfully', { elementFound: true })
        : createActionResult(false, 'Click was not acknowledged by the device', {
            elementFound: true,
            errorCode: ErrorCodes.OPERATION_FAILED,
          });
    } catch (error) {
      this.logger.error('Failed to click element', error, { selector: describeSelector(selector) });
      return createActionResult(false, `Click operation failed: ${errorMessage(error)}`, {
        elementFound: true,
        errorCode: ErrorCodes.OPERATION_FAILED,
      });
    }
  }

  async input(selector: ElementSelector, text: string, clearFirst = true): Promise<ActionResult> {
    const resolution = await this.resolver.resolve(selector);
    if (resolution.status !== 'found') {
      return this.resolutionFailure(resolution, selector);
    }

    try {
      const focused = await this.device.tap(centerOf(nodeBounds(resolution.node)));
      if (!focused) {
        return createActionResult(false, 'Could not focus the element', {
          elementFound: true,
          errorCode: ErrorCodes.OPERATION_FAILED,
        });
      }

      const existing = nodeAttribute(resolution.node, Attr.TEXT);
      if (clearFirst && existing.length > 0) {
        this.logger.debug('Clearing element first', { length: existing.length });
        if (!(await this.device.clearText(existing.length))) {
          return createActionResult(false, 'Clearing existing text failed', {
            elementFound: true,
            errorCode: ErrorCodes.OPERATION_FAILED,
          });
        }
      }

      if (text.length > 0 && !(await this.device.typeText(text))) {
        return createActionResult(false, 'Text input was not acknowledged by the device', {
          elementFound: true,
          errorCode: ErrorCodes.OPERATION_FAILED,
        });
      }

      return createActionResult(true, 'Text entered successfully', { elementFound: true });
    } catch (error) {
      this.logger.error('Failed to input text', error, { selector: describeSelector(selector) });
      return createActionResult(false, `Input operation failed: ${errorMessage(error)}`, {
        elementFound: true,
        errorCode: ErrorCodes.OPERATION_FAILED,
      });
    }
  }

  async scroll(direction: string, steps = 1, selector?: ElementSelector): Promise<ActionResult> {
    const parsed = parseDirection(direction);
    if (!parsed) {
      this.logger.warn('Invalid scroll direction', { direction });
      return createActionResult(false, `Invalid scroll direction: ${direction}`, {
        errorCode: ErrorCodes.INVALID_DIRECTION,
      });
    }

    const swipeCount = Math.min(MAX_CONTAINER_SWIPES, Math.max(1, Math.trunc(steps)));
    const container = selector ? await this.resolver.resolve(selector) : undefined;

    try {
      // An unusable (empty) selector falls back to a full-screen swipe.
      if (container && container.status !== 'invalid') {
        if (container.status !== 'found') {
          this.logger.warn('Scroll container not found', { selector: selector && describeSelector(selector) });
          return createActionResult(false, 'Scroll container not found', {
            errorCode: ErrorCodes.ELEMENT_NOT_FOUND,
          });
        }

        const path = containerSwipePath(parsed, nodeBounds(container.node));
        let acknowledged = true;
        for (let swipe = 0; swipe < swipeCount && acknowledged; swipe++) {
          acknowledged = await this.device.swipe(path.from, path.to, CONTAINER_SWIPE_STEPS);
        }
        return createActionResult(acknowledged, acknowledged ? 'Scroll completed' : 'Scroll failed', {
          elementFound: true,
          errorCode: acknowledged ? undefined : ErrorCodes.OPERATION_FAILED,
        });
      }

      const path = screenSwipePath(parsed, await this.device.getScreenSize());
      this.logger.debug('Scrolling entire screen', { direction: parsed, ...path });
      const acknowledged = await this.device.swipe(path.from, path.to, SCREEN_SWIPE_STEPS);
      return createActionResult(acknowledged, acknowledged ? 'Scroll completed' : 'Scroll failed', {
        errorCode: acknowledged ? undefined : ErrorCodes.OPERATION_FAILED,
      });
    } catch (error) {
      this.logger.error('Failed to scroll', error, { direction: parsed });
      return createActionResult(false, `Scroll operation failed: ${errorMessage(error)}`, {
        errorCode: ErrorCodes.OPERATION_FAILED,
      });
    }
  }

  async pressKey(key: HardwareKey): Promise<ActionResult> {
    const label = KEY_LABELS[key];
    try {
      const acknowledged = await this.device.pressKey(key);
      this.logger.debug(`${label} key press result`, { acknowledged });
      return acknowledged
        ? createActionResult(true, `${label} key pressed`)
        : createActionResult(false, `${label} key press failed`, { errorCode: ErrorCodes.OPERATION_FAILED });
    } catch (error) {
      this.logger.error(`${label} key operation failed`, error);
      return createActionResult(false, `${label} key operation failed: ${errorMessage(error)}`, {
        errorCode: ErrorCodes.OPERATION_FAILED,
      });
    }
  }

  pressBack(): Promise<ActionResult> {
    return this.pressKey('back');
  }

  pressHome(): Promise<ActionResult> {
    return this.pressKey('home');
  }

  pressRecent(): Promise<ActionResult> {
    return this.pressKey('recent');
  }

  async deviceInfo(): Promise<DeviceInfo> {
    const [screenSize, properties] = await Promise.all([this.device.getScreenSize(), this.device.getProperties()]);
    return {
      screenSize,
      apiLevel: properties.apiLevel,
      manufacturer: properties.manufacturer,
      model: properties.model,
      version: properties.version,
    };
  }

  private resolutionFailure(resolution: Exclude<Resolution, { status: 'found' }>, selector: ElementSelector): ActionResult {
    if (resolution.status === 'invalid') {
      this.logger.warn('Invalid selector provided', { selector: describeSelector(selector) });
      return createActionResult(false, 'Invalid selector', { errorCode: ErrorCodes.INVALID_SELECTOR });
    }
    this.logger.warn('Element not found', { selector: describeSelector(selector) });
    return createActionResult(false, 'Element not found', { errorCode: ErrorCodes.ELEMENT_NOT_FOUND });
  }
}
