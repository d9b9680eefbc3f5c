import { execFile } from 'child_process';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import {
  AndroidDevice,
  ADBCommandError,
  ADBNotFoundError,
  DeviceNotFoundError,
  DeviceProperties,
  ForegroundApp,
  HardwareKey,
  NoDevicesFoundError,
  PlatformNode,
  Point,
  ScreenSize,
  UiDevice,
} from '../types';
import { errorMessage } from './error';
import { createLogger, Logger } from './logger';

const ADB_BINARY = 'adb';

// Default timeout for ADB commands (10 seconds)
export const DEFAULT_TIMEOUT = 10000;
const DEFAULT_MAX_BUFFER = 50 * 1024 * 1024;
const UI_DUMP_PATH = '/sdcard/ui-automator-bridge.xml';
const ATTRIBUTE_PREFIX = '@_';
// uiautomator gesture steps are ~5ms each
const SWIPE_STEP_DURATION_MS = 5;
const DELETE_BATCH_SIZE = 50;

export const KEY_CODES: Record<HardwareKey, number> = {
  back: 4,
  home: 3,
  recent: 187,
};
const KEYCODE_DEL = 67;
const KEYCODE_MOVE_END = 123;
const KEYCODE_TAB = 61;
const KEYCODE_ENTER = 66;

const DEVICE_STATUSES: readonly AndroidDevice['status'][] = ['device', 'offline', 'unauthorized'];

export interface AdbCommandOptions {
  timeoutMs?: number;
}

export type AdbExecutor = (args: string[], options?: AdbCommandOptions) => Promise<string>;

// Quote for the device-side shell; the host side never goes through a shell.
export function escapeShellArg(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export type TextInputStep = { kind: 'text'; value: string } | { kind: 'key'; code: number };

/**
 * Splits text into `input text` chunks and key events. `input text` turns every
 * `%s` into a space and cannot carry line breaks or tabs, so spaces are encoded
 * as `%s`, newlines and tabs become ENTER and TAB presses, and a literal `%`
 * followed by `s` is split across two chunks.
 */
export function planTextInput(value: string): TextInputStep[] {
  const steps: TextInputStep[] = [];
  let chunk = '';
  const flush = (): void => {
    if (chunk) {
      steps.push({ kind: 'text', value: chunk });
      chunk = '';
    }
  };

  for (const char of value) {
    if (char === '\n' || char === '\t') {
      flush();
      steps.push({ kind: 'key', code: char === '\n' ? KEYCODE_ENTER : KEYCODE_TAB });
    } else if (char === '\r') {
      continue;
    } else if (/\s/.test(char)) {
      chunk += '%s';
    } else {
      // only a literal '%' can leave the chunk ending in '%'
      if (char === 's' && chunk.endsWith('%')) {
        flush();
      }
      chunk += char;
    }
  }
  flush();

  return steps;
}

function normalizeActivityName(activity: string, packageName: string): string {
  if (activity.startsWith('.')) {
    return `${packageName}${activity}`;
  }

  return activity;
}

// Execute ADB command with error handling
export function executeADBCommand(args: string[], options: AdbCommandOptions = {}): Promise<string> {
  const command = args.join(' ');

  return new Promise((resolve, reject) => {
    execFile(
      ADB_BINARY,
      args,
      { timeout: options.timeoutMs ?? DEFAULT_TIMEOUT, maxBuffer: DEFAULT_MAX_BUFFER, encoding: 'utf8' },
      (error, stdout, stderr) => {
        if (!error) {
          resolve(stdout);
          return;
        }

        const code: unknown = error.code;
        if (code === 'ENOENT') {
          reject(new ADBNotFoundError());
          return;
        }
        if (code === 1 && stdout) {
          // Some ADB commands exit non-zero even though they produced output
          resolve(stdout);
          return;
        }
        if (error.killed) {
          reject(
            new ADBCommandError('ADB_COMMAND_TIMEOUT', `ADB command timed out: ${command}`, {
              command,
              timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT,
            })
          );
          return;
        }

        reject(
          new ADBCommandError('ADB_COMMAND_FAILED', `ADB command failed: ${error.message}`, {
            command,
            stderr: stderr.trim(),
          })
        );
      }
    );
  });
}

// Parse device list from ADB output
export function parseDeviceList(output: string): AndroidDevice[] {
  const lines = output.trim().split('\n');
  const devices: AndroidDevice[] = [];

  // Skip header line
  for (let i = 1; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    const parts = line.split(/\s+/);
    if (parts.length < 2) continue;

    const device: AndroidDevice = {
      id: parts[0],
      status: DEVICE_STATUSES.find(status => status === parts[1]) ?? 'unknown',
    };

    // Parse additional device information
    for (let j = 2; j < parts.length; j++) {
      const part = parts[j];
      if (part.startsWith('model:')) {
        device.model = part.substring(6);
      } else if (part.startsWith('product:')) {
        device.product = part.substring(8);
      } else if (part.startsWith('transport_id:')) {
        device.transportId = part.substring(13);
      } else if (part.startsWith('usb:')) {
        device.usb = part.substring(4);
      }
    }

    devices.push(device);
  }

  return devices;
}

// Get list of connected devices
export async function getConnectedDevices(exec: AdbExecutor = executeADBCommand): Promise<AndroidDevice[]> {
  let output: string;
  try {
    output = await exec(['devices', '-l']);
  } catch (error) {
    if (error instanceof ADBNotFoundError) {
      throw error;
    }
    throw new ADBCommandError('FAILED_TO_LIST_DEVICES', 'Failed to list connected devices', {
      originalError: errorMessage(error),
    });
  }

  const devices = parseDeviceList(output);
  if (devices.length === 0) {
    throw new NoDevicesFoundError();
  }

  return devices;
}

export async function resolveDeviceId(
  deviceId?: string,
  exec: AdbExecutor = executeADBCommand
): Promise<string> {
  const devices = await getConnectedDevices(exec);

  if (deviceId) {
    const device = devices.find(d => d.id === deviceId);

    if (!device) {
      throw new DeviceNotFoundError(deviceId);
    }

    if (device.status !== 'device') {
      throw new ADBCommandError(
        'DEVICE_NOT_AVAILABLE',
        `Device '${deviceId}' is not available (status: ${device.status})`,
        { device }
      );
    }

    return deviceId;
  }

  const availableDevice = devices.find(device => device.status === 'device');
  if (!availableDevice) {
    throw new ADBCommandError('NO_AVAILABLE_DEVICES', 'No available devices found', { devices });
  }

  return availableDevice.id;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecords(value: unknown): Record<string, unknown>[] {
  const items = Array.isArray(value) ? value : [value];
  return items.filter(isRecord);
}

function toPlatformNode(raw: Record<string, unknown>): PlatformNode {
  const attributes: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (key.startsWith(ATTRIBUTE_PREFIX) && typeof value === 'string') {
      attributes[key.slice(ATTRIBUTE_PREFIX.length)] = value;
    }
  }

  return {
    attributes,
    children: asRecords(raw.node).map(toPlatformNode),
  };
}

const hierarchyParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  parseAttributeValue: false,
  trimValues: false,
  // uiautomator writes line breaks and non-ASCII characters as numeric references
  htmlEntities: true,
  isArray: name => name === 'node',
});

/**
 * Parses `uiautomator dump` output. Returns undefined when the document has no
 * root node; throws on anything that is not a hierarchy document.
 */
export function parseUiHierarchy(xml: string): PlatformNode | undefined {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new ADBCommandError('UI_DUMP_INVALID', `Malformed UI hierarchy: ${validation.err.msg}`, {
      line: validation.err.line,
    });
  }

  const parsed: unknown = hierarchyParser.parse(xml);
  if (!isRecord(parsed) || !isRecord(parsed.hierarchy)) {
    throw new ADBCommandError('UI_DUMP_INVALID', 'UI dump has no hierarchy element');
  }

  const [root] = asRecords(parsed.hierarchy.node);
  return root ? toPlatformNode(root) : undefined;
}

export function parseWindowSize(output: string): ScreenSize {
  const raw = output.trim();
  const physicalMatch = raw.match(/Physical size:\s*(\d+)x(\d+)/i);
  const overrideMatch = raw.match(/Override size:\s*(\d+)x(\d+)/i);
  const match = overrideMatch ?? physicalMatch;

  const width = match ? parseInt(match[1], 10) : 0;
  const height = match ? parseInt(match[2], 10) : 0;

  if (!width || !height) {
    throw new ADBCommandError('WINDOW_SIZE_NOT_FOUND', 'Failed to parse window size from device output', {
      output: raw,
    });
  }

  return { width, height };
}

const FOCUS_MARKERS = [
  'topResumedActivity',
  'mTopResumedActivity',
  'ResumedActivity',
  'mResumedActivity',
  'mFocusedApp',
  'mFocusedActivity',
  'mCurrentFocus',
  'mFocusedWindow',
];

// Extracts the focused component from `dumpsys activity activities` or `dumpsys window windows`.
export function parseCurrentActivity(output: string): ForegroundApp {
  const rawLine =
    output
      .split('\n')
      .map(line => line.trim())
      .find(line => FOCUS_MARKERS.some(marker => line.includes(marker))) ?? '';

  const match = rawLine.match(/([A-Za-z0-9._]+)\/([A-Za-z0-9._$]+)/);
  if (!match) {
    return {};
  }

  const packageName = match[1];
  return { packageName, activity: normalizeActivityName(match[2], packageName) };
}

export function parseGetprop(output: string): Record<string, string> {
  const properties: Record<string, string> = {};
  output
    .split('\n')
    .map(line => line.trim())
    .forEach(line => {
      const match = line.match(/^\[([^\]]+)\]: \[(.*)\]$/);
      if (!match) return;
      properties[match[1]] = match[2];
    });
  return properties;
}

// `input` reports most failures on stdout with a zero exit status.
function isAcknowledged(output: string): boolean {
  return !/(Error|Exception)\b/.test(output);
}

export interface AdbDeviceOptions {
  commandTimeoutMs?: number;
  exec?: AdbExecutor;
  logger?: Logger;
}

/**
 * Device surface driven over ADB. Every call issues fresh commands; nothing
 * read from the device is cached.
 */
export class AdbDevice implements UiDevice {
  private readonly exec: AdbExecutor;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(
    readonly deviceId: string,
    options: AdbDeviceOptions = {}
  ) {
    this.exec = options.exec ?? executeADBCommand;
    this.timeoutMs = options.commandTimeoutMs ?? DEFAULT_TIMEOUT;
    this.logger = options.logger ?? createLogger('adb');
  }

  private run(args: string[]): Promise<string> {
    this.logger.debug('adb', { device: this.deviceId, args: args.join(' ') });
    return this.exec(['-s', this.deviceId, ...args], { timeoutMs: this.timeoutMs });
  }

  private async input(args: string[]): Promise<boolean> {
    const output = await this.run(['shell', 'input', ...args]);
    const acknowledged = isAcknowledged(output);
    if (!acknowledged) {
      this.logger.warn('Input command rejected by device', { args: args.join(' '), output: output.trim() });
    }
    return acknowledged;
  }

  async readHierarchy(): Promise<PlatformNode | undefined> {
    const dumpOutput = await this.run(['shell', 'uiautomator', 'dump', UI_DUMP_PATH]);
    if (/null root node/i.test(dumpOutput)) {
      return undefined;
    }

    const xml = (await this.run(['exec-out', 'cat', UI_DUMP_PATH])).trim();
    await this.run(['shell', 'rm', '-f', UI_DUMP_PATH]);

    if (!xml.includes('<hierarchy')) {
      throw new ADBCommandError('UI_DUMP_FAILED', `Failed to dump UI hierarchy from device '${this.deviceId}'`, {
        deviceId: this.deviceId,
        output: dumpOutput.trim(),
      });
    }

    return parseUiHierarchy(xml);
  }

  async getForegroundApp(): Promise<ForegroundApp> {
    const activities = parseCurrentActivity(await this.run(['shell', 'dumpsys', 'activity', 'activities']));
    if (activities.packageName) {
      return activities;
    }
    return parseCurrentActivity(await this.run(['shell', 'dumpsys', 'window', 'windows']));
  }

  async getScreenSize(): Promise<ScreenSize> {
    return parseWindowSize(await this.run(['shell', 'wm', 'size']));
  }

  async getProperties(): Promise<DeviceProperties> {
    const properties = parseGetprop(await this.run(['shell', 'getprop']));
    const apiLevel = parseInt(properties['ro.build.version.sdk'] ?? '', 10);

    return {
      manufacturer: properties['ro.product.manufacturer'] ?? '',
      model: properties['ro.product.model'] ?? '',
      version: properties['ro.build.version.release'] ?? '',
      apiLevel: Number.isNaN(apiLevel) ? 0 : apiLevel,
    };
  }

  tap(point: Point): Promise<boolean> {
    return this.input(['tap', String(point.x), String(point.y)]);
  }

  swipe(from: Point, to: Point, steps: number): Promise<boolean> {
    const durationMs = Math.max(1, steps) * SWIPE_STEP_DURATION_MS;
    return this.input([
      'swipe',
      String(from.x),
      String(from.y),
      String(to.x),
      String(to.y),
      String(durationMs),
    ]);
  }

  async clearText(length: number): Promise<boolean> {
    if (!(await this.input(['keyevent', String(KEYCODE_MOVE_END)]))) {
      return false;
    }

    for (let remaining = length; remaining > 0; remaining -= DELETE_BATCH_SIZE) {
      const batch = Array.from({ length: Math.min(remaining, DELETE_BATCH_SIZE) }, () => String(KEYCODE_DEL));
      if (!(await this.input(['keyevent', ...batch]))) {
        return false;
      }
    }
    return true;
  }

  async typeText(text: string): Promise<boolean> {
    for (const step of planTextInput(text)) {
      const args =
        step.kind === 'text' ? ['text', escapeShellArg(step.value)] : ['keyevent', String(step.code)];
      if (!(await this.input(args))) {
        return false;
      }
    }
    return true;
  }

  pressKey(key: HardwareKey): Promise<boolean> {
    return this.input(['keyevent', String(KEY_CODES[key])]);
  }
}
