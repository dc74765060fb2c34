// src/core/extract/structures.ts

import { Category, Cloud, Enclosure, Guid, Image, Source, TextInput } from '../model/structures';
import { allDirectChildren, attribute, firstDirectChild, text } from '../xml/TreeAdapter';
import type { XmlElement } from '../xml/types';
import {
  absent,
  dropped,
  nonEmptyAttribute,
  ok,
  optionalChildText,
  parseInteger,
  validated,
} from './primitives';
import type { Extraction } from './primitives';

const PERMALINK_FALSE = new Set(['false', '0', 'no']);

/**
 * Every <category> child with text; empty ones are skipped
 */
export function extractCategories(parent: XmlElement): Category[] {
  const categories: Category[] = [];
  for (const node of allDirectChildren(parent, 'category')) {
    const value = text(node);
    if (!value) continue;
    categories.push(new Category({ value, domain: attribute(node, 'domain') }));
  }
  return categories;
}

/**
 * <cloud domain port path registerProcedure protocol/>
 */
export function extractCloud(channel: XmlElement): Extraction<Cloud> {
  const node = firstDirectChild(channel, 'cloud');
  if (!node) return absent();

  const domain = nonEmptyAttribute(node, 'domain');
  const portText = nonEmptyAttribute(node, 'port');
  const path = nonEmptyAttribute(node, 'path');
  const registerProcedure = nonEmptyAttribute(node, 'registerProcedure');
  const protocol = nonEmptyAttribute(node, 'protocol');
  if (!domain || !portText || !path || !registerProcedure || !protocol) {
    return dropped('cloud requires domain, port, path, registerProcedure and protocol');
  }

  const port = parseInteger(portText);
  if (port === undefined) {
    return dropped(`cloud port is not an integer: ${portText}`);
  }

  return validated(new Cloud({ domain, port, path, registerProcedure, protocol }));
}

/**
 * <image> with url, title and link children. Width and height fall back to
 * their defaults when missing, unparseable or zero.
 */
export function extractImage(channel: XmlElement): Extraction<Image> {
  const node = firstDirectChild(channel, 'image');
  if (!node) return absent();

  const url = optionalChildText(node, 'url');
  const title = optionalChildText(node, 'title');
  const link = optionalChildText(node, 'link');
  if (!url || !title || !link) {
    return dropped('image requires url, title and link');
  }

  const width = parseInteger(optionalChildText(node, 'width')) || undefined;
  const height = parseInteger(optionalChildText(node, 'height')) || undefined;

  return validated(
    new Image({
      url,
      title,
      link,
      width,
      height,
      description: optionalChildText(node, 'description'),
    })
  );
}

export function extractTextInput(channel: XmlElement): Extraction<TextInput> {
  const node = firstDirectChild(channel, 'textInput');
  if (!node) return absent();

  const title = optionalChildText(node, 'title');
  const description = optionalChildText(node, 'description');
  const name = optionalChildText(node, 'name');
  const link = optionalChildText(node, 'link');
  if (!title || !description || !name || !link) {
    return dropped('textInput requires title, description, name and link');
  }
  return ok(new TextInput({ title, description, name, link }));
}

/**
 * <enclosure url length type/>
 */
export function extractEnclosure(item: XmlElement): Extraction<Enclosure> {
  const node = firstDirectChild(item, 'enclosure');
  if (!node) return absent();

  const url = nonEmptyAttribute(node, 'url');
  const lengthText = nonEmptyAttribute(node, 'length');
  const mediaType = nonEmptyAttribute(node, 'type');
  if (!url || !lengthText || !mediaType) {
    return dropped('enclosure requires url, length and type');
  }

  const length = parseInteger(lengthText);
  if (length === undefined) {
    return dropped(`enclosure length is not an integer: ${lengthText}`);
  }

  return validated(new Enclosure({ url, length, mediaType }));
}

/**
 * <guid isPermaLink="...">. An unrecognised flag keeps the permalink default
 */
export function extractGuid(item: XmlElement): Extraction<Guid> {
  const node = firstDirectChild(item, 'guid');
  if (!node) return absent();

  const value = text(node);
  if (!value) {
    return dropped('guid has no text');
  }

  const flag = attribute(node, 'isPermaLink')?.toLowerCase();
  const isPermaLink = flag === undefined || !PERMALINK_FALSE.has(flag);
  return ok(new Guid({ value, isPermaLink }));
}

/**
 * <source url="...">Channel name</source>
 */
export function extractSource(item: XmlElement): Extraction<Source> {
  const node = firstDirectChild(item, 'source');
  if (!node) return absent();

  const url = nonEmptyAttribute(node, 'url');
  const name = text(node);
  if (!url || !name) {
    return dropped('source requires a url attribute and a name');
  }
  return ok(new Source({ name, url }));
}
