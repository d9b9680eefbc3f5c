import { XMLBuilder } from 'fast-xml-parser';
import { PageSource, UIElement } from '../types';
import { formatBoundsString } from '../utils/bounds';

const XML_DECLARATION = "<?xml version='1.0' encoding='UTF-8' standalone='yes' ?>";

type XmlNode = Record<string, string | XmlNode[]>;

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  suppressEmptyNode: true,
  suppressBooleanAttributes: false,
});

function toXmlNode(element: UIElement, index: number, packageName: string): XmlNode {
  return {
    '@_index': String(index),
    '@_text': element.text,
    '@_resource-id': element.resourceId,
    '@_class': element.className,
    '@_package': packageName,
    '@_content-desc': element.contentDescription,
    '@_checkable': String(element.checkable),
    '@_checked': String(element.checked),
    '@_clickable': String(element.clickable),
    '@_enabled': String(element.enabled),
    '@_focused': String(element.focused),
    '@_scrollable': String(element.scrollable),
    '@_bounds': formatBoundsString(element.bounds),
    node: element.children.map((child, childIndex) => toXmlNode(child, childIndex, packageName)),
  };
}

// Serializes a snapshot in the layout `uiautomator dump` produces.
export function pageSourceToXml(page: PageSource): string {
  const document = {
    hierarchy: {
      '@_rotation': '0',
      node: [toXmlNode(page.root, 0, page.packageName)],
    },
  };
  return `${XML_DECLARATION}${builder.build(document)}`;
}
