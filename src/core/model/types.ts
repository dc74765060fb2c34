// src/core/model/types.ts

import type { Category, Cloud, Enclosure, Guid, Image, Source, TextInput } from './structures';
import type { Item } from './Channel';

export const WEEKDAYS = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export interface CategoryInit {
  value: string;
  domain?: string;
}

export interface GuidInit {
  value: string;
  isPermaLink?: boolean; // Defaults to true
}

export interface EnclosureInit {
  url: string;
  length: number; // Bytes
  mediaType: string;
}

export interface SourceInit {
  name: string;
  url: string;
}

export interface CloudInit {
  domain: string;
  port: number;
  path: string;
  registerProcedure: string;
  protocol: string;
}

export interface ImageInit {
  url: string;
  title: string;
  link: string;
  width?: number; // Defaults to 88
  height?: number; // Defaults to 31
  description?: string;
}

export interface TextInputInit {
  title: string;
  description: string;
  name: string;
  link: string;
}

export interface ItemInit {
  title?: string;
  link?: string;
  description?: string;
  author?: string;
  categories?: readonly Category[];
  comments?: string;
  enclosure?: Enclosure;
  guid?: Guid;
  pubDate?: string; // RFC 822 text, parsed on demand
  source?: Source;
}

export interface ChannelInit {
  title: string;
  link: string;
  description: string;
  language?: string;
  copyright?: string;
  managingEditor?: string;
  webMaster?: string;
  pubDate?: string;
  lastBuildDate?: string;
  categories?: readonly Category[];
  generator?: string;
  docs?: string;
  cloud?: Cloud;
  ttl?: number; // Minutes
  image?: Image;
  rating?: string;
  textInput?: TextInput;
  skipHours?: readonly number[];
  skipDays?: readonly Weekday[];
  items?: readonly Item[];
}
