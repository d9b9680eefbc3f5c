import { Bounds, Point } from '../types';

const BOUNDS_PATTERN = /^\[(-?\d+),(-?\d+)\]\[(-?\d+),(-?\d+)\]$/;

export const EMPTY_BOUNDS: Readonly<Bounds> = Object.freeze({ left: 0, top: 0, right: 0, bottom: 0 });

export function centerX(bounds: Bounds): number {
  return Math.floor((bounds.left + bounds.right) / 2);
}

export function centerY(bounds: Bounds): number {
  return Math.floor((bounds.top + bounds.bottom) / 2);
}

export function centerOf(bounds: Bounds): Point {
  return { x: centerX(bounds), y: centerY(bounds) };
}

export function boundsWidth(bounds: Bounds): number {
  return bounds.right - bounds.left;
}

export function boundsHeight(bounds: Bounds): number {
  return bounds.bottom - bounds.top;
}

export function boundsEqual(a: Bounds, b: Bounds): boolean {
  return a.left === b.left && a.top === b.top && a.right === b.right && a.bottom === b.bottom;
}

export function containsPoint(bounds: Bounds, point: Point): boolean {
  return (
    point.x >= bounds.left &&
    point.x < bounds.right &&
    point.y >= bounds.top &&
    point.y < bounds.bottom
  );
}

// Parses the uiautomator form "[left,top][right,bottom]"
export function parseBoundsString(value: string): Bounds {
  const match = value.trim().match(BOUNDS_PATTERN);
  if (!match) {
    throw new Error(`Malformed bounds: '${value}'`);
  }

  const bounds = {
    left: parseInt(match[1], 10),
    top: parseInt(match[2], 10),
    right: parseInt(match[3], 10),
    bottom: parseInt(match[4], 10),
  };

  if (bounds.right < bounds.left || bounds.bottom < bounds.top) {
    throw new Error(`Inverted bounds: '${value}'`);
  }

  return bounds;
}

export function formatBoundsString(bounds: Bounds): string {
  return `[${bounds.left},${bounds.top}][${bounds.right},${bounds.bottom}]`;
}
