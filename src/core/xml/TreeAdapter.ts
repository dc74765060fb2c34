// src/core/xml/TreeAdapter.ts

import type { XmlElement, XmlNode } from './types';

/**
 * Element and attribute lookups that compare local names only.
 *
 * Namespace bindings are never resolved: `<dc:title>`, `<atom:title>` and
 * `<title>` all answer to `title`. These functions are the only XML surface
 * the extractors use.
 */

/**
 * Name with any `prefix:` removed
 */
export function localName(name: string): string {
  const colon = name.indexOf(':');
  return colon === -1 ? name : name.slice(colon + 1);
}

function elementsOf(nodes: readonly XmlNode[]): XmlElement[] {
  return nodes.filter((node): node is XmlElement => node.kind === 'element');
}

/**
 * First immediate child element with the given local name (non-recursive)
 */
export function firstDirectChild(
  node: XmlElement | undefined,
  name: string
): XmlElement | undefined {
  if (!node) return undefined;
  return elementsOf(node.children).find((child) => localName(child.name) === name);
}

/**
 * All immediate child elements with the given local name, in document order
 */
export function allDirectChildren(node: XmlElement | undefined, name: string): XmlElement[] {
  if (!node) return [];
  return elementsOf(node.children).filter((child) => localName(child.name) === name);
}

/**
 * Depth-first, document-order search for the first element with the given local name
 */
export function firstDescendant(nodes: readonly XmlNode[], name: string): XmlElement | undefined {
  for (const element of elementsOf(nodes)) {
    if (localName(element.name) === name) {
      return element;
    }
    const nested = firstDescendant(element.children, name);
    if (nested) {
      return nested;
    }
  }
  return undefined;
}

function collectText(nodes: readonly XmlNode[]): string {
  return nodes
    .map((node) => (node.kind === 'text' ? node.value : collectText(node.children)))
    .join('');
}

/**
 * Trimmed text of a node: its direct text when that is its only content,
 * otherwise the concatenated text of all descendants.
 *
 * @returns `undefined` for a missing node or one whose text is empty
 */
export function text(node: XmlElement | undefined): string | undefined {
  if (!node) return undefined;

  const [only] = node.children;
  const raw =
    node.children.length === 1 && only.kind === 'text' ? only.value : collectText(node.children);
  const trimmed = raw.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Trimmed attribute value, matched by exact name first and then by local name.
 * Never throws.
 */
export function attribute(node: XmlElement | undefined, name: string): string | undefined {
  if (!node) return undefined;

  let value: string | undefined = node.attributes[name];
  if (value === undefined) {
    const key = Object.keys(node.attributes).find((candidate) => localName(candidate) === name);
    value = key === undefined ? undefined : node.attributes[key];
  }
  return value === undefined ? undefined : value.trim();
}
