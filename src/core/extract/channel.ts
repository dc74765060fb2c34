// src/core/extract/channel.ts

import { Channel, Item } from '../model/Channel';
import { WEEKDAYS } from '../model/types';
import type { Weekday } from '../model/types';
import { allDirectChildren, firstDirectChild, text } from '../xml/TreeAdapter';
import type { XmlElement } from '../xml/types';
import {
  optionalChildText,
  parseInteger,
  requireChildText,
  settle,
} from './primitives';
import type { DropReporter } from './primitives';
import {
  extractCategories,
  extractCloud,
  extractEnclosure,
  extractGuid,
  extractImage,
  extractSource,
  extractTextInput,
} from './structures';

const WEEKDAY_SET: ReadonlySet<string> = new Set(WEEKDAYS);

function isWeekday(value: string): value is Weekday {
  return WEEKDAY_SET.has(value);
}

/**
 * <skipHours><hour>n</hour>...</skipHours>; entries outside 0-23 are dropped
 */
export function extractSkipHours(channel: XmlElement): number[] {
  const hours: number[] = [];
  for (const node of allDirectChildren(firstDirectChild(channel, 'skipHours'), 'hour')) {
    const hour = parseInteger(text(node));
    if (hour === undefined || hour < 0 || hour > 23) continue;
    hours.push(hour);
  }
  return hours;
}

/**
 * <skipDays><day>Name</day>...</skipDays>; names are matched after capitalising
 */
export function extractSkipDays(channel: XmlElement): Weekday[] {
  const days: Weekday[] = [];
  for (const node of allDirectChildren(firstDirectChild(channel, 'skipDays'), 'day')) {
    const value = text(node);
    if (!value) continue;
    const normalized = value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
    if (isWeekday(normalized)) {
      days.push(normalized);
    }
  }
  return days;
}

/**
 * Items lacking both title and description are dropped
 */
export function extractItems(channel: XmlElement, onDrop: DropReporter): Item[] {
  const items: Item[] = [];
  allDirectChildren(channel, 'item').forEach((node, index) => {
    const title = optionalChildText(node, 'title');
    const description = optionalChildText(node, 'description');
    if (title === undefined && description === undefined) {
      onDrop('item', `item ${index} has neither title nor description`);
      return;
    }

    items.push(
      new Item({
        title,
        link: optionalChildText(node, 'link'),
        description,
        author: optionalChildText(node, 'author'),
        categories: extractCategories(node),
        comments: optionalChildText(node, 'comments'),
        enclosure: settle(extractEnclosure(node), 'enclosure', onDrop),
        guid: settle(extractGuid(node), 'guid', onDrop),
        pubDate: optionalChildText(node, 'pubDate'),
        source: settle(extractSource(node), 'source', onDrop),
      })
    );
  });
  return items;
}

/**
 * Build the channel. The skeleton fails fast; every optional part degrades
 * to absence.
 *
 * @throws {MissingFieldError} If title, link or description is missing or empty
 */
export function extractChannel(channel: XmlElement, onDrop: DropReporter): Channel {
  return new Channel({
    title: requireChildText(channel, 'title'),
    link: requireChildText(channel, 'link'),
    description: requireChildText(channel, 'description'),
    language: optionalChildText(channel, 'language'),
    copyright: optionalChildText(channel, 'copyright'),
    managingEditor: optionalChildText(channel, 'managingEditor'),
    webMaster: optionalChildText(channel, 'webMaster'),
    pubDate: optionalChildText(channel, 'pubDate'),
    lastBuildDate: optionalChildText(channel, 'lastBuildDate'),
    categories: extractCategories(channel),
    generator: optionalChildText(channel, 'generator'),
    docs: optionalChildText(channel, 'docs'),
    cloud: settle(extractCloud(channel), 'cloud', onDrop),
    ttl: parseInteger(optionalChildText(channel, 'ttl')),
    image: settle(extractImage(channel), 'image', onDrop),
    rating: optionalChildText(channel, 'rating'),
    textInput: settle(extractTextInput(channel), 'textInput', onDrop),
    skipHours: extractSkipHours(channel),
    skipDays: extractSkipDays(channel),
    items: extractItems(channel, onDrop),
  });
}
