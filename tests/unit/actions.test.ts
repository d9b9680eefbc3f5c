import {
  ActionExecutor,
  containerSwipePath,
  MAX_CONTAINER_SWIPES,
  parseDirection,
  screenSwipePath,
} from '../../src/automation/actions';
import { SelectorResolver } from '../../src/automation/selector';
import { ErrorCodes } from '../../src/types';
import { FakeDevice } from '../mocks/fake-device';

function createExecutor(device: FakeDevice): ActionExecutor {
  return new ActionExecutor(device, new SelectorResolver(device));
}

describe('ActionExecutor', () => {
  let device: FakeDevice;
  let actions: ActionExecutor;

  beforeEach(() => {
    device = new FakeDevice();
    actions = createExecutor(device);
  });

  describe('click', () => {
    it('should tap the center of the matched element', async () => {
      const result = await actions.click({ resourceId: 'com.example.app:id/submit' });

      expect(result).toMatchObject({ success: true, message: 'Element clicked successfully', elementFound: true });
      expect(result.errorCode).toBeUndefined();
      expect(device.calls).toEqual(['tap 540,650']);
    });

    it('should toggle a checkbox on the live surface', async () => {
      await actions.click({ resourceId: 'com.example.app:id/remember' });

      expect(device.find('com.example.app:id/remember')?.attributes.checked).toBe('true');
    });

    it('should reject an empty selector without touching the device', async () => {
      const result = await actions.click({});

      expect(result).toMatchObject({
        success: false,
        message: 'Invalid selector',
        elementFound: false,
        errorCode: ErrorCodes.INVALID_SELECTOR,
      });
      expect(device.hierarchyReads).toBe(0);
      expect(device.calls).toEqual([]);
    });

    it('should report a missing element', async () => {
      const result = await actions.click({ text: 'Create account' });

      expect(result).toMatchObject({ success: false, elementFound: false, errorCode: ErrorCodes.ELEMENT_NOT_FOUND });
      expect(device.calls).toEqual([]);
    });

    it('should treat a failed hierarchy query as not found', async () => {
      device.failOn('readHierarchy');

      const result = await actions.click({ text: 'Sign in' });

      expect(result.errorCode).toBe(ErrorCodes.ELEMENT_NOT_FOUND);
    });

    it('should report an unacknowledged tap as an operation failure', async () => {
      device.acknowledge = false;

      const result = await actions.click({ text: 'Sign in' });

      expect(result).toMatchObject({ success: false, elementFound: true, errorCode: ErrorCodes.OPERATION_FAILED });
    });

    it('should attach the cause when the tap raises', async () => {
      device.failOn('tap', new Error('input service died'));

      const result = await actions.click({ text: 'Sign in' });

      expect(result).toMatchObject({
        success: false,
        message: 'Click operation failed: input service died',
        elementFound: true,
        errorCode: ErrorCodes.OPERATION_FAILED,
      });
    });
  });

  describe('input', () => {
    it('should focus, clear and type by default', async () => {
      const result = await actions.input({ resourceId: 'com.example.app:id/username' }, 'alice');

      expect(result).toMatchObject({ success: true, message: 'Text entered successfully', elementFound: true });
      expect(device.calls).toEqual(['tap 540,250', 'clear 3', 'type alice']);
      expect(device.find('com.example.app:id/username')?.attributes.text).toBe('alice');
    });

    it('should append when clearFirst is false', async () => {
      await actions.input({ resourceId: 'com.example.app:id/username' }, '-x', false);

      expect(device.calls).toEqual(['tap 540,250', 'type -x']);
      expect(device.find('com.example.app:id/username')?.attributes.text).toBe('old-x');
    });

    it('should report a failure to focus the element', async () => {
      device.acknowledge = false;

      const result = await actions.input({ resourceId: 'com.example.app:id/username' }, 'alice');

      expect(result).toMatchObject({
        success: false,
        message: 'Could not focus the element',
        errorCode: ErrorCodes.OPERATION_FAILED,
      });
      expect(device.calls).toEqual(['tap 540,250']);
    });

    it('should convert a raised clear into an operation failure', async () => {
      device.failOn('clearText');

      const result = await actions.input({ resourceId: 'com.example.app:id/username' }, 'alice');

      expect(result.message).toBe('Input operation failed: clearText failed');
      expect(result.errorCode).toBe(ErrorCodes.OPERATION_FAILED);
    });

    it('should report a missing element', async () => {
      const result = await actions.input({ resourceId: 'com.example.app:id/password' }, 'secret');

      expect(result.errorCode).toBe(ErrorCodes.ELEMENT_NOT_FOUND);
    });
  });

  describe('scroll', () => {
    it('should reject an unknown direction before any device access', async () => {
      const result = await actions.scroll('diagonal', 1, { resourceId: 'com.example.app:id/form' });

      expect(result).toMatchObject({
        success: false,
        message: 'Invalid scroll direction: diagonal',
        errorCode: ErrorCodes.INVALID_DIRECTION,
      });
      expect(device.hierarchyReads).toBe(0);
      expect(device.calls).toEqual([]);
    });

    it('should swipe the whole screen between its thirds with a fixed step count', async () => {
      const result = await actions.scroll('UP');

      expect(result).toMatchObject({ success: true, message: 'Scroll completed' });
      expect(device.calls).toEqual(['swipe 540,1280 540,640 10']);
    });

    it('should move the finger against the direction inside a container', async () => {
      const result = await actions.scroll('down', 1, { resourceId: 'com.example.app:id/form' });

      expect(result).toMatchObject({ success: true, message: 'Scroll completed', elementFound: true });
      expect(device.calls).toEqual(['swipe 540,1630 540,270 10']);
    });

    it('should scroll a container further with more steps', async () => {
      await actions.scroll('up', 3, { resourceId: 'com.example.app:id/form' });

      expect(device.calls).toEqual([
        'swipe 540,270 540,1630 10',
        'swipe 540,270 540,1630 10',
        'swipe 540,270 540,1630 10',
      ]);
    });

    it('should stop repeating after a rejected container swipe', async () => {
      device.acknowledge = false;

      const result = await actions.scroll('right', 4, { resourceId: 'com.example.app:id/form' });

      expect(result).toMatchObject({ success: false, message: 'Scroll failed', errorCode: ErrorCodes.OPERATION_FAILED });
      expect(device.calls).toEqual(['swipe 972,950 108,950 10']);
    });

    it('should clamp steps below one', async () => {
      await actions.scroll('left', 0, { resourceId: 'com.example.app:id/form' });

      expect(device.calls).toEqual(['swipe 108,950 972,950 10']);
    });

    it('should cap the number of container swipes', async () => {
      await actions.scroll('down', 1000, { resourceId: 'com.example.app:id/form' });

      expect(device.calls).toHaveLength(MAX_CONTAINER_SWIPES);
    });

    it('should report a missing container distinctly', async () => {
      const result = await actions.scroll('up', 1, { resourceId: 'com.example.app:id/list' });

      expect(result).toMatchObject({
        success: false,
        message: 'Scroll container not found',
        errorCode: ErrorCodes.ELEMENT_NOT_FOUND,
      });
      expect(device.calls).toEqual([]);
    });

    it('should fall back to a screen swipe for an empty selector', async () => {
      await actions.scroll('right', 3, {});

      expect(device.calls).toEqual(['swipe 360,960 720,960 10']);
    });

    it('should report a rejected swipe', async () => {
      device.acknowledge = false;

      const result = await actions.scroll('up');

      expect(result).toMatchObject({ success: false, message: 'Scroll failed', errorCode: ErrorCodes.OPERATION_FAILED });
    });
  });

  describe('hardware keys', () => {
    it('should press back', async () => {
      const result = await actions.pressBack();

      expect(result).toMatchObject({ success: true, message: 'Back key pressed', elementFound: false });
      expect(device.calls).toEqual(['key back']);
    });

    it('should report an unacknowledged key press', async () => {
      device.acknowledge = false;

      const result = await actions.pressRecent();

      expect(result).toMatchObject({
        success: false,
        message: 'Recent apps key press failed',
        errorCode: ErrorCodes.OPERATION_FAILED,
      });
    });

    it('should convert a raised key press', async () => {
      device.failOn('pressKey');

      const result = await actions.pressHome();

      expect(result.message).toBe('Home key operation failed: pressKey failed');
    });
  });

  it('should read device info', async () => {
    await expect(actions.deviceInfo()).resolves.toEqual({
      screenSize: { width: 1080, height: 1920 },
      apiLevel: 34,
      manufacturer: 'Acme',
      model: 'Test Phone',
      version: '14',
    });
  });
});

describe('Swipe geometry', () => {
  it('should parse directions case-insensitively', () => {
    expect(parseDirection(' Left ')).toBe('left');
    expect(parseDirection('DOWN')).toBe('down');
    expect(parseDirection('sideways')).toBeUndefined();
  });

  it('should mirror screen swipes per axis', () => {
    const size = { width: 900, height: 1500 };
    expect(screenSwipePath('down', size)).toEqual({ from: { x: 450, y: 500 }, to: { x: 450, y: 1000 } });
    expect(screenSwipePath('left', size)).toEqual({ from: { x: 600, y: 750 }, to: { x: 300, y: 750 } });
  });

  it('should keep container swipes within the middle of the container', () => {
    const bounds = { left: 100, top: 200, right: 600, bottom: 1200 };
    expect(containerSwipePath('up', bounds)).toEqual({ from: { x: 350, y: 300 }, to: { x: 350, y: 1100 } });
    expect(containerSwipePath('down', bounds)).toEqual({ from: { x: 350, y: 1100 }, to: { x: 350, y: 300 } });
    expect(containerSwipePath('right', bounds)).toEqual({ from: { x: 550, y: 700 }, to: { x: 150, y: 700 } });
  });
});
