// src/core/model/structures.ts

import { ValidationError } from '../../utils/errors';
import type {
  CategoryInit,
  CloudInit,
  EnclosureInit,
  GuidInit,
  ImageInit,
  SourceInit,
  TextInputInit,
} from './types';

export const IMAGE_DEFAULT_WIDTH = 88;
export const IMAGE_DEFAULT_HEIGHT = 31;
export const IMAGE_MAX_WIDTH = 144;
export const IMAGE_MAX_HEIGHT = 400;

// Upper-cased forms of the protocols an rssCloud endpoint may advertise
const CLOUD_PROTOCOLS = new Set(['HTTP-POST', 'XML-RPC', 'SOAP 1.1', 'SOAP']);

/**
 * Taxonomy location for a channel or item <category>
 */
export class Category {
  readonly value: string;
  readonly domain?: string;

  constructor(init: CategoryInit) {
    this.value = init.value;
    this.domain = init.domain;
    Object.freeze(this);
  }
}

/**
 * Item identity from <guid>. `isPermaLink` defaults to true.
 */
export class Guid {
  readonly value: string;
  readonly isPermaLink: boolean;

  constructor(init: GuidInit) {
    this.value = init.value;
    this.isPermaLink = init.isPermaLink ?? true;
    Object.freeze(this);
  }
}

/**
 * Media object attached to an item
 */
export class Enclosure {
  readonly url: string;
  readonly length: number;
  readonly mediaType: string;

  constructor(init: EnclosureInit) {
    this.url = init.url;
    this.length = init.length;
    this.mediaType = init.mediaType;
    Object.freeze(this);
  }

  validate(): void {
    if (this.length < 0) {
      throw new ValidationError(
        'Enclosure length must be a non-negative byte count',
        'enclosure.length',
        { length: this.length }
      );
    }
  }
}

/**
 * Channel an item was republished from
 */
export class Source {
  readonly name: string;
  readonly url: string;

  constructor(init: SourceInit) {
    this.name = init.name;
    this.url = init.url;
    Object.freeze(this);
  }
}

/**
 * rssCloud notification endpoint advertised by <cloud>
 */
export class Cloud {
  readonly domain: string;
  readonly port: number;
  readonly path: string;
  readonly registerProcedure: string;
  readonly protocol: string;

  constructor(init: CloudInit) {
    this.domain = init.domain;
    this.port = init.port;
    this.path = init.path;
    this.registerProcedure = init.registerProcedure;
    this.protocol = init.protocol;
    Object.freeze(this);
  }

  /**
   * Protocol names compare case-insensitively; the value keeps its original spelling.
   */
  validate(): void {
    if (!CLOUD_PROTOCOLS.has(this.protocol.toUpperCase())) {
      throw new ValidationError(
        'Cloud protocol must be one of HTTP-POST, XML-RPC, or SOAP 1.1',
        'cloud.protocol',
        { protocol: this.protocol }
      );
    }
  }
}

/**
 * Channel branding image. Width and height default to 88x31.
 */
export class Image {
  readonly url: string;
  readonly title: string;
  readonly link: string;
  readonly width: number;
  readonly height: number;
  readonly description?: string;

  constructor(init: ImageInit) {
    this.url = init.url;
    this.title = init.title;
    this.link = init.link;
    this.width = init.width ?? IMAGE_DEFAULT_WIDTH;
    this.height = init.height ?? IMAGE_DEFAULT_HEIGHT;
    this.description = init.description;
    Object.freeze(this);
  }

  validate(): void {
    if (this.width > IMAGE_MAX_WIDTH) {
      throw new ValidationError(
        `Image width must not exceed ${IMAGE_MAX_WIDTH} pixels`,
        'image.width',
        { width: this.width }
      );
    }
    if (this.height > IMAGE_MAX_HEIGHT) {
      throw new ValidationError(
        `Image height must not exceed ${IMAGE_MAX_HEIGHT} pixels`,
        'image.height',
        { height: this.height }
      );
    }
  }
}

export class TextInput {
  readonly title: string;
  readonly description: string;
  readonly name: string;
  readonly link: string;

  constructor(init: TextInputInit) {
    this.title = init.title;
    this.description = init.description;
    this.name = init.name;
    this.link = init.link;
    Object.freeze(this);
  }
}
