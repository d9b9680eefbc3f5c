import { Bounds, PageSource, PlatformNode, UIElement, UiDevice } from '../types';
import { EMPTY_BOUNDS } from '../utils/bounds';
import { formatErrorForResponse } from '../utils/error';
import { createLogger, Logger } from '../utils/logger';
import { Attr, nodeAttribute, nodeBounds, nodeFlag } from './platform-node';

export const PLACEHOLDER_CLASS = 'error';
export const FALLBACK_ROOT_CLASS = 'android.widget.FrameLayout';

export function emptyElement(className: string): UIElement {
  return {
    resourceId: '',
    text: '',
    className,
    contentDescription: '',
    bounds: { ...EMPTY_BOUNDS },
    clickable: false,
    scrollable: false,
    checkable: false,
    checked: false,
    enabled: true,
    focused: false,
    children: [],
  };
}

/**
 * Copies a live node and its subtree into an immutable snapshot. A node whose own
 * fields cannot be read becomes a placeholder; its siblings are unaffected.
 */
export function toUIElement(node: PlatformNode, onFailure?: (error: unknown, node: PlatformNode) => void): UIElement {
  try {
    const bounds = nodeBounds(node);
    return {
      resourceId: nodeAttribute(node, Attr.RESOURCE_ID),
      text: nodeAttribute(node, Attr.TEXT),
      className: nodeAttribute(node, Attr.CLASS),
      contentDescription: nodeAttribute(node, Attr.CONTENT_DESC),
      bounds,
      clickable: nodeFlag(node, Attr.CLICKABLE),
      scrollable: nodeFlag(node, Attr.SCROLLABLE),
      checkable: nodeFlag(node, Attr.CHECKABLE),
      checked: nodeFlag(node, Attr.CHECKED),
      enabled: nodeFlag(node, Attr.ENABLED, true),
      focused: nodeFlag(node, Attr.FOCUSED),
      children: node.children.map(child => toUIElement(child, onFailure)),
    };
  } catch (error) {
    onFailure?.(error, node);
    return emptyElement(PLACEHOLDER_CLASS);
  }
}

export class TreeSnapshotBuilder {
  private readonly logger: Logger;

  constructor(
    private readonly device: UiDevice,
    logger: Logger = createLogger('snapshot')
  ) {
    this.logger = logger;
  }

  /**
   * Snapshot of the UI at call time. Never rejects: a failed traversal yields a
   * single-node tree, failed metadata lookups yield empty values.
   */
  async build(): Promise<PageSource> {
    const timestamp = Date.now();
    const [root, foreground, screenSize] = await Promise.all([
      this.captureRoot(),
      this.captureForeground(),
      this.captureScreenBounds(),
    ]);

    return {
      root: root.element,
      timestamp,
      packageName: foreground.packageName || root.packageName,
      activity: foreground.activity,
      screenSize,
    };
  }

  private async captureRoot(): Promise<{ element: UIElement; packageName: string }> {
    let degraded = 0;
    try {
      const live = await this.device.readHierarchy();
      if (!live) {
        this.logger.warn('No accessible root; returning minimal tree');
        return { element: emptyElement(FALLBACK_ROOT_CLASS), packageName: '' };
      }

      const element = toUIElement(live, (error, node) => {
        degraded += 1;
        this.logger.debug('Node conversion failed', {
          className: nodeAttribute(node, Attr.CLASS),
          error: formatErrorForResponse(error),
        });
      });

      if (degraded > 0) {
        this.logger.warn('Snapshot degraded', { placeholders: degraded });
      }
      return { element, packageName: nodeAttribute(live, Attr.PACKAGE) };
    } catch (error) {
      this.logger.error('Failed to read UI hierarchy; returning minimal tree', error);
      return { element: emptyElement(FALLBACK_ROOT_CLASS), packageName: '' };
    }
  }

  private async captureForeground(): Promise<{ packageName: string; activity: string }> {
    try {
      const foreground = await this.device.getForegroundApp();
      return { packageName: foreground.packageName ?? '', activity: foreground.activity ?? '' };
    } catch (error) {
      this.logger.warn('Foreground app lookup failed', { error: formatErrorForResponse(error) });
      return { packageName: '', activity: '' };
    }
  }

  private async captureScreenBounds(): Promise<Bounds> {
    try {
      const { width, height } = await this.device.getScreenSize();
      return { left: 0, top: 0, right: width, bottom: height };
    } catch (error) {
      this.logger.warn('Screen size lookup failed', { error: formatErrorForResponse(error) });
      return { ...EMPTY_BOUNDS };
    }
  }
}
