// src/core/model/Channel.ts

import type { Category, Cloud, Enclosure, Guid, Image, Source, TextInput } from './structures';
import type { ChannelInit, ItemInit, Weekday } from './types';

export const RSS_VERSION = '2.0';

/**
 * One <item>: a story, a synopsis, or a complete piece of content.
 * Validity (title or description present) is checked by the validation engine.
 */
export class Item {
  readonly title?: string;
  readonly link?: string;
  readonly description?: string;
  readonly author?: string;
  readonly categories: readonly Category[];
  readonly comments?: string;
  readonly enclosure?: Enclosure;
  readonly guid?: Guid;
  readonly pubDate?: string;
  readonly source?: Source;

  constructor(init: ItemInit) {
    this.title = init.title;
    this.link = init.link;
    this.description = init.description;
    this.author = init.author;
    this.categories = Object.freeze([...(init.categories ?? [])]);
    this.comments = init.comments;
    this.enclosure = init.enclosure;
    this.guid = init.guid;
    this.pubDate = init.pubDate;
    this.source = init.source;
    Object.freeze(this);
  }
}

/**
 * The <channel> skeleton (title, link, description) plus its optional metadata and items.
 */
export class Channel {
  readonly title: string;
  readonly link: string;
  readonly description: string;
  readonly language?: string;
  readonly copyright?: string;
  readonly managingEditor?: string;
  readonly webMaster?: string;
  readonly pubDate?: string;
  readonly lastBuildDate?: string;
  readonly categories: readonly Category[];
  readonly generator?: string;
  readonly docs?: string;
  readonly cloud?: Cloud;
  readonly ttl?: number;
  readonly image?: Image;
  readonly rating?: string;
  readonly textInput?: TextInput;
  readonly skipHours: readonly number[];
  readonly skipDays: readonly Weekday[];
  readonly items: readonly Item[];

  constructor(init: ChannelInit) {
    this.title = init.title;
    this.link = init.link;
    this.description = init.description;
    this.language = init.language;
    this.copyright = init.copyright;
    this.managingEditor = init.managingEditor;
    this.webMaster = init.webMaster;
    this.pubDate = init.pubDate;
    this.lastBuildDate = init.lastBuildDate;
    this.categories = Object.freeze([...(init.categories ?? [])]);
    this.generator = init.generator;
    this.docs = init.docs;
    this.cloud = init.cloud;
    this.ttl = init.ttl;
    this.image = init.image;
    this.rating = init.rating;
    this.textInput = init.textInput;
    this.skipHours = Object.freeze([...(init.skipHours ?? [])]);
    this.skipDays = Object.freeze([...(init.skipDays ?? [])]);
    this.items = Object.freeze([...(init.items ?? [])]);
    Object.freeze(this);
  }
}

/**
 * Whole RSS document. `version` defaults to "2.0".
 */
export class RssFeed {
  readonly channel: Channel;
  readonly version: string;

  constructor(init: { channel: Channel; version?: string }) {
    this.channel = init.channel;
    this.version = init.version ?? RSS_VERSION;
    Object.freeze(this);
  }
}
