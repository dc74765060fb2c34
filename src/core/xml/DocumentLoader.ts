// src/core/xml/DocumentLoader.ts

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { InputError, XmlSyntaxError } from '../../utils/errors';
import type { LoaderLimits, SafeDocument, XmlNode } from './types';

const ATTRIBUTE_PREFIX = '@_';
const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

/**
 * Parser options for untrusted feeds.
 * DOCTYPE-bearing input never reaches the parser, so no DTD is ever read and
 * only the predefined and character entities are decoded.
 */
const parserOptions = {
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_KEY,
  // Keep every value as text; numeric fields are parsed by the extractors
  parseTagValue: false,
  parseAttributeValue: false,
  // Whitespace matters inside mixed content; the tree adapter trims
  trimValues: false,
  // Namespace prefixes are kept and compared by local name later
  removeNSPrefix: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  processEntities: true,
  htmlEntities: true,
  allowBooleanAttributes: false,
};

const DOCTYPE_TOKEN = '<!doctype';
const ENTITY_TOKEN = '<!entity';

/**
 * Load untrusted RSS text into an order-preserving XML tree.
 *
 * The DOCTYPE/ENTITY scan runs on the raw string before the XML engine sees
 * it, which blocks external-entity and entity-expansion payloads outright. It
 * also rejects feeds that merely mention those tokens in escaped text.
 *
 * @throws {InputError} If the input is not text, is blank, is too large, or declares a DTD or entity
 * @throws {XmlSyntaxError} If the document is not well-formed XML
 */
export function loadDocument(raw: unknown, limits: LoaderLimits = {}): SafeDocument {
  if (typeof raw !== 'string') {
    throw new InputError('RSS payload must be provided as a string', 'INPUT_NOT_TEXT', {
      receivedType: raw === null ? 'null' : typeof raw,
    });
  }

  // A leading BOM or blank lines would otherwise trip the XML declaration check
  const trimmed = raw.replace(/^\uFEFF/, '').trim();
  if (!trimmed) {
    throw new InputError('Empty RSS payload provided', 'INPUT_EMPTY');
  }

  if (limits.maxDocumentLength !== undefined && raw.length > limits.maxDocumentLength) {
    throw new InputError('RSS payload exceeds the configured size limit', 'INPUT_TOO_LARGE', {
      length: raw.length,
      maxDocumentLength: limits.maxDocumentLength,
    });
  }

  const folded = trimmed.toLowerCase();
  if (folded.includes(DOCTYPE_TOKEN)) {
    throw new InputError(
      'Refusing to process RSS feeds that declare a document type',
      'INPUT_DOCTYPE'
    );
  }
  if (folded.includes(ENTITY_TOKEN)) {
    throw new InputError(
      'Refusing to process RSS feeds that declare custom entities',
      'INPUT_ENTITY'
    );
  }

  const validation = XMLValidator.validate(trimmed);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new XmlSyntaxError(`Malformed XML at line ${line}, column ${col}: ${msg}`, line, col, {
      reason: validation.err.code,
    });
  }

  let parsed: unknown;
  try {
    parsed = new XMLParser(parserOptions).parse(trimmed);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new XmlSyntaxError(`Unable to parse RSS XML document: ${message}`);
  }

  return { nodes: toNodes(parsed) };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toText(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

/**
 * Convert fast-xml-parser's ordered output
 * (`[{ tag: [...children], ':@': { '@_attr': 'v' } }, { '#text': '...' }]`)
 * into typed nodes.
 */
function toNodes(raw: unknown): XmlNode[] {
  if (!Array.isArray(raw)) {
    return [];
  }

  const nodes: XmlNode[] = [];
  for (const entry of raw) {
    if (!isRecord(entry)) continue;

    for (const [key, value] of Object.entries(entry)) {
      if (key === ATTRIBUTES_KEY) continue;

      if (key === TEXT_KEY) {
        const text = toText(value);
        if (text !== undefined) {
          nodes.push({ kind: 'text', value: text });
        }
        continue;
      }

      nodes.push({
        kind: 'element',
        name: key,
        attributes: toAttributes(entry[ATTRIBUTES_KEY]),
        children: toNodes(value),
      });
    }
  }
  return nodes;
}

function toAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) {
    return attributes;
  }
  for (const [key, value] of Object.entries(raw)) {
    const text = toText(value);
    if (text === undefined) continue;
    const name = key.startsWith(ATTRIBUTE_PREFIX) ? key.slice(ATTRIBUTE_PREFIX.length) : key;
    attributes[name] = text;
  }
  return attributes;
}
