import { FALLBACK_ROOT_CLASS, PLACEHOLDER_CLASS, TreeSnapshotBuilder } from '../../src/automation/snapshot';
import { FakeDevice, fakeNode } from '../mocks/fake-device';

describe('TreeSnapshotBuilder', () => {
  it('should copy the live tree with its metadata', async () => {
    const device = new FakeDevice();

    const page = await new TreeSnapshotBuilder(device).build();

    expect(page.packageName).toBe('com.example.app');
    expect(page.activity).toBe('com.example.app.LoginActivity');
    expect(page.screenSize).toEqual({ left: 0, top: 0, right: 1080, bottom: 1920 });
    expect(page.root.className).toBe('android.widget.FrameLayout');

    const form = page.root.children[0];
    expect(form.resourceId).toBe('com.example.app:id/form');
    expect(form.scrollable).toBe(true);
    expect(form.children.map(child => child.className)).toEqual([
      'android.widget.EditText',
      'android.widget.CheckBox',
      'android.widget.Button',
      'android.widget.TextView',
    ]);
    expect(form.children[2]).toEqual({
      resourceId: 'com.example.app:id/submit',
      text: 'Sign in',
      className: 'android.widget.Button',
      contentDescription: 'Submit form',
      bounds: { left: 40, top: 600, right: 1040, bottom: 700 },
      clickable: true,
      scrollable: false,
      checkable: false,
      checked: false,
      enabled: true,
      focused: false,
      children: [],
    });
  });

  it('should replace an unreadable node with a placeholder and keep its siblings', async () => {
    const device = new FakeDevice(
      fakeNode({ class: 'android.widget.LinearLayout', bounds: '[0,0][100,100]' }, [
        fakeNode({ text: 'first', bounds: '[0,0][100,10]' }),
        fakeNode({ text: 'broken', bounds: 'not-bounds' }, [fakeNode({ text: 'lost', bounds: '[0,0][1,1]' })]),
        fakeNode({ text: 'third', bounds: '[0,20][100,30]' }),
      ])
    );

    const page = await new TreeSnapshotBuilder(device).build();

    expect(page.root.className).toBe('android.widget.LinearLayout');
    expect(page.root.children.map(child => child.text)).toEqual(['first', '', 'third']);
    expect(page.root.children[1].className).toBe(PLACEHOLDER_CLASS);
    expect(page.root.children[1].children).toEqual([]);
  });

  it('should return a minimal tree when the hierarchy read fails', async () => {
    const device = new FakeDevice();
    device.failOn('readHierarchy');

    const page = await new TreeSnapshotBuilder(device).build();

    expect(page.root.className).toBe(FALLBACK_ROOT_CLASS);
    expect(page.root.children).toEqual([]);
    expect(page.root.bounds).toEqual({ left: 0, top: 0, right: 0, bottom: 0 });
    expect(page.packageName).toBe('com.example.app');
  });

  it('should return a minimal tree when there is no accessible root', async () => {
    const device = new FakeDevice();
    device.root = undefined;

    const page = await new TreeSnapshotBuilder(device).build();

    expect(page.root.className).toBe(FALLBACK_ROOT_CLASS);
    expect(page.root.children).toEqual([]);
  });

  it('should degrade metadata lookups independently', async () => {
    const device = new FakeDevice();
    device.failOn('getForegroundApp');
    device.failOn('getScreenSize');

    const page = await new TreeSnapshotBuilder(device).build();

    // package falls back to the root node's own package attribute
    expect(page.packageName).toBe('com.example.app');
    expect(page.activity).toBe('');
    expect(page.screenSize).toEqual({ left: 0, top: 0, right: 0, bottom: 0 });
    expect(page.root.children).toHaveLength(1);
  });

  it('should not reflect later changes to the live tree', async () => {
    const device = new FakeDevice();
    const page = await new TreeSnapshotBuilder(device).build();

    const remember = device.find('com.example.app:id/remember');
    if (remember) {
      remember.attributes.checked = 'true';
    }

    expect(page.root.children[0].children[1].checked).toBe(false);
  });
});
