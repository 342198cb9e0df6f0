/**
 * Element Navigation Helpers
 *
 * Children are matched by local name, so the same paths work for every AdV
 * schema version regardless of the prefix a document binds.
 */

import { Element, type Document } from '@xmldom/xmldom';
import { GML_NAMESPACES, ID_PREFIX, XLINK_NAMESPACE, isAdvNamespace } from './namespaces';

/**
 * Direct child elements, in document order
 */
export function childElements(element: Element): Element[] {
  const children: Element[] = [];
  for (let node = element.firstChild; node !== null; node = node.nextSibling) {
    if (node instanceof Element) {
      children.push(node);
    }
  }
  return children;
}

/**
 * First direct child element with the given local name
 */
export function findChild(element: Element, localName: string): Element | null {
  return childElements(element).find((child) => child.localName === localName) ?? null;
}

/**
 * All direct child elements with the given local name
 */
export function findChildren(element: Element, localName: string): Element[] {
  return childElements(element).filter((child) => child.localName === localName);
}

/**
 * Follow a path of local names, taking the first match at every step
 */
export function findPath(element: Element, path: readonly string[]): Element | null {
  let current: Element | null = element;
  for (const localName of path) {
    if (current === null) return null;
    current = findChild(current, localName);
  }
  return current;
}

/**
 * Follow a path of local names, fanning out over every match at every step
 */
export function findAllPath(element: Element, path: readonly string[]): Element[] {
  let current: Element[] = [element];
  for (const localName of path) {
    current = current.flatMap((el) => findChildren(el, localName));
  }
  return current;
}

/**
 * Trimmed text content; empty text counts as absent
 */
export function textOf(element: Element | null): string | null {
  if (element === null) return null;
  const text = element.textContent?.trim() ?? '';
  return text.length > 0 ? text : null;
}

/**
 * Value of an xlink attribute (href, title)
 */
export function getXlinkAttribute(element: Element | null, name: string): string | null {
  if (element === null) return null;
  const value = element.getAttributeNS(XLINK_NAMESPACE, name);
  return value ? value : null;
}

/**
 * The gml:id of a feature element
 */
export function getGmlId(element: Element): string | null {
  for (const ns of GML_NAMESPACES) {
    const value = element.getAttributeNS(ns, 'id');
    if (value) return value;
  }
  return null;
}

/**
 * Parent of an element, null at the document root
 */
export function parentElement(element: Element): Element | null {
  const parent = element.parentNode;
  return parent instanceof Element ? parent : null;
}

/**
 * Value of an attribute on the element or its nearest ancestor carrying it
 */
export function findInheritedAttribute(element: Element, name: string): string | null {
  for (let node: Element | null = element; node !== null; node = parentElement(node)) {
    const value = node.getAttribute(name);
    if (value) return value;
  }
  return null;
}

/**
 * Strip the urn:adv:oid: prefix from an object identifier
 */
export function removeIdPrefix(value: string): string {
  return value.startsWith(ID_PREFIX) ? value.slice(ID_PREFIX.length) : value;
}

/**
 * All elements of a feature type in any AdV namespace, in document order
 */
export function findFeatureElements(document: Document, tag: string): Element[] {
  const matches = document.getElementsByTagNameNS('*', tag);
  const elements: Element[] = [];
  for (let i = 0; i < matches.length; i++) {
    const element = matches.item(i);
    if (element && isAdvNamespace(element.namespaceURI)) {
      elements.push(element);
    }
  }
  return elements;
}
