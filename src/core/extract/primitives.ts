// src/core/extract/primitives.ts

import { MissingFieldError } from '../../utils/errors';
import { attribute, firstDirectChild, text } from '../xml/TreeAdapter';
import type { XmlElement } from '../xml/types';

/**
 * Outcome of extracting an optional structured element.
 * `dropped` means the element was present but unusable and degrades to absence.
 */
export type Extraction<T> =
  | { status: 'absent' }
  | { status: 'ok'; value: T }
  | { status: 'dropped'; reason: string };

/**
 * Receives every structure or item that was present but dropped
 */
export type DropReporter = (element: string, reason: string) => void;

export const absent = <T>(): Extraction<T> => ({ status: 'absent' });
export const ok = <T>(value: T): Extraction<T> => ({ status: 'ok', value });
export const dropped = <T>(reason: string): Extraction<T> => ({ status: 'dropped', reason });

/**
 * Collapse an extraction to a field value, reporting drops
 */
export function settle<T>(
  extraction: Extraction<T>,
  element: string,
  onDrop: DropReporter
): T | undefined {
  switch (extraction.status) {
    case 'ok':
      return extraction.value;
    case 'dropped':
      onDrop(element, extraction.reason);
      return undefined;
    case 'absent':
      return undefined;
  }
}

/**
 * Run a structure's own validator, turning a failure into a drop
 */
export function validated<T extends { validate(): void }>(value: T): Extraction<T> {
  try {
    value.validate();
  } catch (error) {
    return dropped(error instanceof Error ? error.message : String(error));
  }
  return ok(value);
}

const INTEGER = /^[+-]?\d+$/;

/**
 * Strict base-10 integer; anything else is `undefined`
 */
export function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (!INTEGER.test(trimmed)) return undefined;
  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

export function optionalChildText(parent: XmlElement, name: string): string | undefined {
  return text(firstDirectChild(parent, name));
}

/**
 * @throws {MissingFieldError} If the child is missing or has no text
 */
export function requireChildText(parent: XmlElement, name: string): string {
  const value = optionalChildText(parent, name);
  if (value === undefined) {
    throw new MissingFieldError(name, `Missing required <${name}> element in RSS ${parent.name}`);
  }
  return value;
}

/**
 * Attribute value, with an empty value read as missing
 */
export function nonEmptyAttribute(node: XmlElement, name: string): string | undefined {
  const value = attribute(node, name);
  return value ? value : undefined;
}
