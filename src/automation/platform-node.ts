import { Bounds, PlatformNode } from '../types';
import { parseBoundsString } from '../utils/bounds';

// uiautomator attribute names
export const Attr = {
  RESOURCE_ID: 'resource-id',
  TEXT: 'text',
  CLASS: 'class',
  CONTENT_DESC: 'content-desc',
  PACKAGE: 'package',
  BOUNDS: 'bounds',
  CLICKABLE: 'clickable',
  SCROLLABLE: 'scrollable',
  CHECKABLE: 'checkable',
  CHECKED: 'checked',
  ENABLED: 'enabled',
  FOCUSED: 'focused',
} as const;

export function nodeAttribute(node: PlatformNode, name: string): string {
  return node.attributes[name] ?? '';
}

export function nodeFlag(node: PlatformNode, name: string, fallback = false): boolean {
  const value = node.attributes[name];
  if (value === undefined || value === '') {
    return fallback;
  }
  return value === 'true';
}

/**
 * Visible bounds of a live node. Throws when the device reported a missing or
 * malformed rectangle.
 */
export function nodeBounds(node: PlatformNode): Bounds {
  const raw = node.attributes[Attr.BOUNDS];
  if (raw === undefined) {
    throw new Error('Node has no bounds');
  }
  return parseBoundsString(raw);
}

// Depth-first, pre-order, sibling order as reported.
export function flattenNodes(root: PlatformNode): PlatformNode[] {
  const nodes: PlatformNode[] = [];
  const visit = (node: PlatformNode): void => {
    nodes.push(node);
    for (const child of node.children) {
      visit(child);
    }
  };
  visit(root);
  return nodes;
}
