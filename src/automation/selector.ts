import { ElementSelector, PlatformNode, UiDevice } from '../types';
import { boundsEqual } from '../utils/bounds';
import { formatErrorForResponse } from '../utils/error';
import { createLogger, Logger } from '../utils/logger';
import { Attr, flattenNodes, nodeAttribute, nodeBounds } from './platform-node';

export type Resolution =
  | { status: 'found'; node: PlatformNode; matchCount: number }
  | { status: 'missing' }
  | { status: 'invalid' }
  | { status: 'error'; error: unknown };

const SELECTOR_FIELDS = [
  'resourceId',
  'text',
  'textContains',
  'className',
  'contentDescription',
  'index',
  'bounds',
] as const satisfies readonly (keyof ElementSelector)[];

export function isValidSelector(selector: ElementSelector | undefined): selector is ElementSelector {
  if (!selector) {
    return false;
  }
  const candidate: ElementSelector = selector;
  return SELECTOR_FIELDS.some(field => candidate[field] !== undefined);
}

export function describeSelector(selector: ElementSelector): string {
  const parts = SELECTOR_FIELDS.filter(field => selector[field] !== undefined).map(
    field => `${field}=${JSON.stringify(selector[field])}`
  );
  return parts.length > 0 ? parts.join(' ') : '<empty>';
}

/**
 * Attribute predicate of a selector. `index` is positional and applied by
 * {@link findMatches}, not here.
 */
export function matchesSelector(node: PlatformNode, selector: ElementSelector): boolean {
  if (selector.resourceId !== undefined && nodeAttribute(node, Attr.RESOURCE_ID) !== selector.resourceId) {
    return false;
  }
  if (selector.text !== undefined && nodeAttribute(node, Attr.TEXT) !== selector.text) {
    return false;
  }
  if (selector.textContains !== undefined && !nodeAttribute(node, Attr.TEXT).includes(selector.textContains)) {
    return false;
  }
  if (selector.className !== undefined && nodeAttribute(node, Attr.CLASS) !== selector.className) {
    return false;
  }
  if (
    selector.contentDescription !== undefined &&
    nodeAttribute(node, Attr.CONTENT_DESC) !== selector.contentDescription
  ) {
    return false;
  }
  if (selector.bounds !== undefined) {
    try {
      if (!boundsEqual(nodeBounds(node), selector.bounds)) {
        return false;
      }
    } catch {
      // a node without readable bounds cannot satisfy a positional constraint
      return false;
    }
  }
  return true;
}

export function findMatches(root: PlatformNode, selector: ElementSelector): PlatformNode[] {
  const matches = flattenNodes(root).filter(node => matchesSelector(node, selector));
  if (selector.index === undefined) {
    return matches;
  }
  const picked = matches[selector.index];
  return picked ? [picked] : [];
}

/**
 * Resolves selectors against a fresh read of the device hierarchy. Never retries;
 * callers that need to poll do so themselves.
 */
export class SelectorResolver {
  private readonly logger: Logger;

  constructor(
    private readonly device: UiDevice,
    logger: Logger = createLogger('selector')
  ) {
    this.logger = logger;
  }

  async resolve(selector: ElementSelector | undefined): Promise<Resolution> {
    if (!isValidSelector(selector)) {
      return { status: 'invalid' };
    }

    const description = describeSelector(selector);
    let root: PlatformNode | undefined;
    try {
      root = await this.device.readHierarchy();
    } catch (error) {
      this.logger.warn('Hierarchy query failed during resolution', {
        selector: description,
        error: formatErrorForResponse(error),
      });
      return { status: 'error', error };
    }

    if (!root) {
      this.logger.debug('No accessible root', { selector: description });
      return { status: 'missing' };
    }

    const matches = findMatches(root, selector);
    if (matches.length === 0) {
      this.logger.debug('Element not found', { selector: description });
      return { status: 'missing' };
    }

    this.logger.debug('Element found', { selector: description, matches: matches.length });
    return { status: 'found', node: matches[0], matchCount: matches.length };
  }
}
