import { z } from 'zod';

// Geometry
export interface Bounds {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export interface Point {
  x: number;
  y: number;
}

export interface ScreenSize {
  width: number;
  height: number;
}

// Snapshot model
export interface UIElement {
  resourceId: string;
  text: string;
  className: string;
  contentDescription: string;
  bounds: Bounds;
  clickable: boolean;
  scrollable: boolean;
  checkable: boolean;
  checked: boolean;
  enabled: boolean;
  focused: boolean;
  children: UIElement[];
}

export interface PageSource {
  root: UIElement;
  timestamp: number;
  packageName: string;
  activity: string;
  screenSize: Bounds;
}

// Selectors
export interface ElementSelector {
  readonly resourceId?: string;
  readonly text?: string;
  readonly textContains?: string;
  readonly className?: string;
  readonly contentDescription?: string;
  readonly index?: number;
  readonly bounds?: Readonly<Bounds>;
}

export const SCROLL_DIRECTIONS = ['up', 'down', 'left', 'right'] as const;
export type ScrollDirection = (typeof SCROLL_DIRECTIONS)[number];

export const WAIT_CONDITIONS = ['visible', 'gone', 'clickable'] as const;
export type WaitCondition = (typeof WAIT_CONDITIONS)[number];

export type HardwareKey = 'back' | 'home' | 'recent';

// Results
export const ErrorCodes = {
  ELEMENT_NOT_FOUND: 'ELEMENT_NOT_FOUND',
  TIMEOUT: 'TIMEOUT',
  INVALID_SELECTOR: 'INVALID_SELECTOR',
  OPERATION_FAILED: 'OPERATION_FAILED',
  INVALID_DIRECTION: 'INVALID_DIRECTION',
  SERVICE_ERROR: 'SERVICE_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface ActionResult {
  success: boolean;
  message: string;
  elementFound: boolean;
  errorCode?: ErrorCode;
  timestamp: number;
}

export interface DeviceInfo {
  screenSize: ScreenSize;
  apiLevel: number;
  manufacturer: string;
  model: string;
  version: string;
}

// Device backend

/**
 * A node of the live UI hierarchy as reported by the device, keyed by the
 * uiautomator attribute names (`resource-id`, `class`, `content-desc`, `bounds`, ...).
 */
export interface PlatformNode {
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly PlatformNode[];
}

export interface ForegroundApp {
  packageName?: string;
  activity?: string;
}

export interface DeviceProperties {
  manufacturer: string;
  model: string;
  version: string;
  apiLevel: number;
}

/**
 * The live device surface. Every call is a fresh query or dispatch; implementations
 * must not cache hierarchy reads.
 */
export interface UiDevice {
  readHierarchy(): Promise<PlatformNode | undefined>;
  getForegroundApp(): Promise<ForegroundApp>;
  getScreenSize(): Promise<ScreenSize>;
  getProperties(): Promise<DeviceProperties>;
  tap(point: Point): Promise<boolean>;
  swipe(from: Point, to: Point, steps: number): Promise<boolean>;
  clearText(length: number): Promise<boolean>;
  typeText(text: string): Promise<boolean>;
  pressKey(key: HardwareKey): Promise<boolean>;
}

// Android device listing
export interface AndroidDevice {
  id: string;
  status: 'device' | 'offline' | 'unauthorized' | 'unknown';
  model?: string;
  product?: string;
  transportId?: string;
  usb?: string;
  productString?: string;
}

// Error handling interfaces
export interface ServiceError {
  code: string;
  message: string;
  details?: unknown;
  suggestion?: string;
}

export class ADBCommandError extends Error implements ServiceError {
  code: string;
  details?: unknown;
  suggestion?: string;

  constructor(code: string, message: string, details?: unknown, suggestion?: string) {
    super(message);
    this.name = 'ADBCommandError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
  }
}

export class ADBNotFoundError extends ADBCommandError {
  constructor() {
    super(
      'ADB_NOT_FOUND',
      'Android Debug Bridge (ADB) not found',
      null,
      'Please install Android SDK Platform Tools and ensure ADB is in your PATH'
    );
    this.name = 'ADBNotFoundError';
  }
}

export class DeviceNotFoundError extends ADBCommandError {
  constructor(deviceId: string) {
    super(
      'DEVICE_NOT_FOUND',
      `Device with ID '${deviceId}' not found`,
      { deviceId },
      'Please check if the device is connected and authorized'
    );
    this.name = 'DeviceNotFoundError';
  }
}

export class NoDevicesFoundError extends ADBCommandError {
  constructor() {
    super(
      'NO_DEVICES_FOUND',
      'No Android devices found',
      null,
      'Please connect an Android device or start an emulator and ensure USB debugging is enabled'
    );
    this.name = 'NoDevicesFoundError';
  }
}

export class InvalidPortError extends Error implements ServiceError {
  code = 'INVALID_PORT';
  details: { port: number };
  suggestion = 'Choose a port between 1024 and 65535';

  constructor(port: number) {
    super(`Port ${port} is outside the allowed range 1024-65535`);
    this.name = 'InvalidPortError';
    this.details = { port };
  }
}

export class SessionStartError extends Error implements ServiceError {
  code = 'SESSION_START_FAILED';
  details: { port: number; cause: string };
  suggestion?: string;

  constructor(port: number, cause: string, suggestion?: string) {
    super(`Failed to start automation session on port ${port}: ${cause}`);
    this.name = 'SessionStartError';
    this.details = { port, cause };
    this.suggestion = suggestion;
  }
}

// HTTP request schemas (snake_case on the wire)
export const BoundsInputSchema = z
  .object({
    left: z.number().int().describe('Left edge in pixels'),
    top: z.number().int().describe('Top edge in pixels'),
    right: z.number().int().describe('Right edge in pixels'),
    bottom: z.number().int().describe('Bottom edge in pixels'),
  })
  .describe('Exact on-screen rectangle of the element');

export const SelectorInputSchema = z
  .object({
    resource_id: z.string().optional().describe('Exact resource id, e.g. com.example:id/ok'),
    text: z.string().optional().describe('Exact visible text'),
    text_contains: z.string().optional().describe('Substring of the visible text'),
    class_name: z.string().optional().describe('Fully-qualified class name'),
    content_desc: z.string().optional().describe('Exact content description'),
    index: z.number().int().min(0).optional().describe('0-based position among the matches'),
    bounds: BoundsInputSchema.optional(),
  })
  .transform(
    (input): ElementSelector => ({
      resourceId: input.resource_id,
      text: input.text,
      textContains: input.text_contains,
      className: input.class_name,
      contentDescription: input.content_desc,
      index: input.index,
      bounds: input.bounds,
    })
  );

export const ClickRequestSchema = z.object({
  selector: SelectorInputSchema,
});

export const InputRequestSchema = z.object({
  selector: SelectorInputSchema,
  text: z.string().describe('Text to enter into the element'),
  clear_first: z.boolean().default(true).describe('Clear existing content before typing'),
});

export const ScrollRequestSchema = z.object({
  direction: z.string().describe('One of up, down, left, right (case-insensitive)'),
  steps: z.number().int().default(1).describe('Gesture steps; more steps scroll slower'),
  selector: SelectorInputSchema.optional().describe('Scrollable container to scroll inside'),
});

export const WaitRequestSchema = z.object({
  selector: SelectorInputSchema,
  timeout: z.number().default(5000).describe('Maximum time to wait in milliseconds'),
  condition: z.string().default('visible').describe('One of visible, gone, clickable'),
});

export type ClickRequest = z.infer<typeof ClickRequestSchema>;
export type InputRequest = z.infer<typeof InputRequestSchema>;
export type ScrollRequest = z.infer<typeof ScrollRequestSchema>;
export type WaitRequest = z.infer<typeof WaitRequestSchema>;
