import { ActionResult, Bounds, DeviceInfo, ErrorCode, PageSource, UIElement } from '../types';

// snake_case JSON shapes returned over HTTP

export interface WireActionResult {
  success: boolean;
  message: string;
  element_found: boolean;
  error_code?: ErrorCode;
  timestamp: number;
}

export interface WireElement {
  resource_id: string;
  text: string;
  class_name: string;
  content_desc: string;
  bounds: Bounds;
  clickable: boolean;
  scrollable: boolean;
  checkable: boolean;
  checked: boolean;
  enabled: boolean;
  focused: boolean;
  children: WireElement[];
}

export interface WirePageSource {
  root: WireElement;
  timestamp: number;
  package_name: string;
  activity: string;
  screen_size: Bounds;
}

export interface WireDeviceInfo {
  screen_size: { width: number; height: number };
  api_level: number;
  manufacturer: string;
  model: string;
  version: string;
}

export function toWireActionResult(result: ActionResult): WireActionResult {
  const wire: WireActionResult = {
    success: result.success,
    message: result.message,
    element_found: result.elementFound,
    timestamp: result.timestamp,
  };
  if (result.errorCode !== undefined) {
    wire.error_code = result.errorCode;
  }
  return wire;
}

export function toWireElement(element: UIElement): WireElement {
  return {
    resource_id: element.resourceId,
    text: element.text,
    class_name: element.className,
    content_desc: element.contentDescription,
    bounds: { ...element.bounds },
    clickable: element.clickable,
    scrollable: element.scrollable,
    checkable: element.checkable,
    checked: element.checked,
    enabled: element.enabled,
    focused: element.focused,
    children: element.children.map(toWireElement),
  };
}

export function toWirePageSource(page: PageSource): WirePageSource {
  return {
    root: toWireElement(page.root),
    timestamp: page.timestamp,
    package_name: page.packageName,
    activity: page.activity,
    screen_size: { ...page.screenSize },
  };
}

export function toWireDeviceInfo(info: DeviceInfo): WireDeviceInfo {
  return {
    screen_size: { width: info.screenSize.width, height: info.screenSize.height },
    api_level: info.apiLevel,
    manufacturer: info.manufacturer,
    model: info.model,
    version: info.version,
  };
}
