/**
 * Field Extraction Unit Tests
 *
 * Each structured element either yields a value, is absent, or is dropped
 * with a reason; the channel skeleton fails fast.
 */

import { describe, it, expect, vi } from 'vitest';
import { loadDocument } from '../../src/core/xml/DocumentLoader';
import { firstDescendant } from '../../src/core/xml/TreeAdapter';
import type { XmlElement } from '../../src/core/xml/types';
import {
  extractCategories,
  extractCloud,
  extractEnclosure,
  extractGuid,
  extractImage,
  extractSource,
  extractTextInput,
} from '../../src/core/extract/structures';
import {
  extractChannel,
  extractItems,
  extractSkipDays,
  extractSkipHours,
} from '../../src/core/extract/channel';
import { parseInteger, settle } from '../../src/core/extract/primitives';
import { Category, Cloud, Enclosure, Guid, Image, Source, TextInput } from '../../src/core/model/structures';
import { MissingFieldError } from '../../src/utils/errors';

function element(xml: string, name: string): XmlElement {
  const found = firstDescendant(loadDocument(xml).nodes, name);
  if (!found) {
    throw new Error(`no <${name}> element`);
  }
  return found;
}

const channelOf = (body: string) => element(`<channel>${body}</channel>`, 'channel');
const itemOf = (body: string) => element(`<item>${body}</item>`, 'item');

describe('Field extraction', () => {
  describe('parseInteger', () => {
    it('should accept signed base-10 integers', () => {
      expect(parseInteger('60')).toBe(60);
      expect(parseInteger(' 007 ')).toBe(7);
      expect(parseInteger('-5')).toBe(-5);
      expect(parseInteger('+3')).toBe(3);
    });

    it('should reject everything else', () => {
      expect(parseInteger(undefined)).toBeUndefined();
      expect(parseInteger('1.5')).toBeUndefined();
      expect(parseInteger('0x10')).toBeUndefined();
      expect(parseInteger('1e3')).toBeUndefined();
      expect(parseInteger('60 minutes')).toBeUndefined();
      expect(parseInteger('')).toBeUndefined();
      expect(parseInteger('99999999999999999999')).toBeUndefined();
    });
  });

  describe('settle', () => {
    it('should report drops and return undefined', () => {
      const onDrop = vi.fn();
      expect(settle({ status: 'dropped', reason: 'bad' }, 'cloud', onDrop)).toBeUndefined();
      expect(onDrop).toHaveBeenCalledWith('cloud', 'bad');
    });

    it('should pass values through without reporting', () => {
      const onDrop = vi.fn();
      expect(settle({ status: 'ok', value: 3 }, 'ttl', onDrop)).toBe(3);
      expect(settle({ status: 'absent' }, 'ttl', onDrop)).toBeUndefined();
      expect(onDrop).not.toHaveBeenCalled();
    });
  });

  describe('extractCategories', () => {
    it('should keep non-empty categories with their domain', () => {
      const channel = channelOf(
        '<category domain="urn:tax">A/B</category><category></category><category> C </category>'
      );
      expect(extractCategories(channel)).toEqual([
        new Category({ value: 'A/B', domain: 'urn:tax' }),
        new Category({ value: 'C' }),
      ]);
    });
  });

  describe('extractCloud', () => {
    const cloudXml = (protocol: string, port = '80') =>
      `<cloud domain="rpc.example.com" port="${port}" path="/RPC2" registerProcedure="notify" protocol="${protocol}"/>`;

    it('should build a cloud with a supported protocol', () => {
      expect(extractCloud(channelOf(cloudXml('xml-rpc')))).toEqual({
        status: 'ok',
        value: new Cloud({
          domain: 'rpc.example.com',
          port: 80,
          path: '/RPC2',
          registerProcedure: 'notify',
          protocol: 'xml-rpc',
        }),
      });
    });

    it('should accept protocol aliases in any case', () => {
      expect(extractCloud(channelOf(cloudXml('Soap 1.1'))).status).toBe('ok');
      expect(extractCloud(channelOf(cloudXml('HTTP-POST'))).status).toBe('ok');
    });

    it('should drop an unsupported protocol', () => {
      expect(extractCloud(channelOf(cloudXml('ftp')))).toEqual({
        status: 'dropped',
        reason: 'Cloud protocol must be one of HTTP-POST, XML-RPC, or SOAP 1.1',
      });
    });

    it('should drop a non-numeric port', () => {
      expect(extractCloud(channelOf(cloudXml('soap', 'eighty')))).toEqual({
        status: 'dropped',
        reason: 'cloud port is not an integer: eighty',
      });
    });

    it('should drop a cloud missing attributes', () => {
      expect(extractCloud(channelOf('<cloud domain="rpc.example.com"/>')).status).toBe('dropped');
    });

    it('should report absence', () => {
      expect(extractCloud(channelOf('<title>x</title>'))).toEqual({ status: 'absent' });
    });
  });

  describe('extractImage', () => {
    const imageXml = (extra: string) =>
      `<image><url>https://example.com/i.png</url><title>Logo</title><link>https://example.com/</link>${extra}</image>`;

    it('should apply default dimensions', () => {
      expect(extractImage(channelOf(imageXml('')))).toEqual({
        status: 'ok',
        value: new Image({
          url: 'https://example.com/i.png',
          title: 'Logo',
          link: 'https://example.com/',
          width: 88,
          height: 31,
        }),
      });
    });

    it('should fall back to defaults for unparseable or zero dimensions', () => {
      const result = extractImage(channelOf(imageXml('<width>wide</width><height>0</height>')));
      expect(result).toMatchObject({ status: 'ok', value: { width: 88, height: 31 } });
    });

    it('should keep explicit dimensions within limits', () => {
      const result = extractImage(
        channelOf(imageXml('<width>144</width><height>400</height><description>Alt</description>'))
      );
      expect(result).toMatchObject({
        status: 'ok',
        value: { width: 144, height: 400, description: 'Alt' },
      });
    });

    it('should drop oversized images', () => {
      expect(extractImage(channelOf(imageXml('<width>145</width>')))).toEqual({
        status: 'dropped',
        reason: 'Image width must not exceed 144 pixels',
      });
      expect(extractImage(channelOf(imageXml('<height>401</height>')))).toEqual({
        status: 'dropped',
        reason: 'Image height must not exceed 400 pixels',
      });
    });

    it('should drop an image missing its link', () => {
      const channel = channelOf('<image><url>https://example.com/i.png</url><title>Logo</title></image>');
      expect(extractImage(channel)).toEqual({
        status: 'dropped',
        reason: 'image requires url, title and link',
      });
    });
  });

  describe('extractTextInput', () => {
    it('should require all four children', () => {
      const complete = channelOf(
        '<textInput><title>Go</title><description>Search</description><name>q</name><link>https://example.com/s</link></textInput>'
      );
      expect(extractTextInput(complete)).toEqual({
        status: 'ok',
        value: new TextInput({
          title: 'Go',
          description: 'Search',
          name: 'q',
          link: 'https://example.com/s',
        }),
      });

      const partial = channelOf('<textInput><title>Go</title><name>q</name></textInput>');
      expect(extractTextInput(partial).status).toBe('dropped');
    });
  });

  describe('extractEnclosure', () => {
    it('should parse url, length and type', () => {
      const item = itemOf('<enclosure url="https://example.com/a.mp3" length="1024" type="audio/mpeg"/>');
      expect(extractEnclosure(item)).toEqual({
        status: 'ok',
        value: new Enclosure({ url: 'https://example.com/a.mp3', length: 1024, mediaType: 'audio/mpeg' }),
      });
    });

    it('should drop negative or non-numeric lengths', () => {
      const negative = itemOf('<enclosure url="https://example.com/a.mp3" length="-1" type="audio/mpeg"/>');
      expect(extractEnclosure(negative)).toEqual({
        status: 'dropped',
        reason: 'Enclosure length must be a non-negative byte count',
      });

      const word = itemOf('<enclosure url="https://example.com/a.mp3" length="big" type="audio/mpeg"/>');
      expect(extractEnclosure(word).status).toBe('dropped');
    });

    it('should drop an enclosure with an empty url', () => {
      const item = itemOf('<enclosure url="" length="1" type="audio/mpeg"/>');
      expect(extractEnclosure(item).status).toBe('dropped');
    });
  });

  describe('extractGuid', () => {
    it('should default isPermaLink to true', () => {
      expect(extractGuid(itemOf('<guid>https://example.com/1</guid>'))).toEqual({
        status: 'ok',
        value: new Guid({ value: 'https://example.com/1', isPermaLink: true }),
      });
    });

    it('should read false-like flags', () => {
      for (const flag of ['false', 'FALSE', '0', 'no']) {
        const result = extractGuid(itemOf(`<guid isPermaLink="${flag}">abc</guid>`));
        expect(result).toMatchObject({ status: 'ok', value: { isPermaLink: false } });
      }
    });

    it('should keep the default for unrecognised flags', () => {
      const result = extractGuid(itemOf('<guid isPermaLink="maybe">abc</guid>'));
      expect(result).toMatchObject({ status: 'ok', value: { value: 'abc', isPermaLink: true } });
    });

    it('should drop an empty guid', () => {
      expect(extractGuid(itemOf('<guid isPermaLink="false"></guid>'))).toEqual({
        status: 'dropped',
        reason: 'guid has no text',
      });
    });
  });

  describe('extractSource', () => {
    it('should take the name from text and the url from the attribute', () => {
      expect(extractSource(itemOf('<source url="https://other.example.com/rss">Other</source>'))).toEqual({
        status: 'ok',
        value: new Source({ name: 'Other', url: 'https://other.example.com/rss' }),
      });
    });

    it('should drop a source without url or name', () => {
      expect(extractSource(itemOf('<source>Other</source>')).status).toBe('dropped');
      expect(extractSource(itemOf('<source url="https://other.example.com/rss"/>')).status).toBe('dropped');
    });
  });

  describe('extractSkipHours', () => {
    it('should drop out-of-range and unparseable hours, keeping order', () => {
      const channel = channelOf(
        '<skipHours><hour>23</hour><hour>24</hour><hour>-1</hour><hour>x</hour><hour>0</hour></skipHours>'
      );
      expect(extractSkipHours(channel)).toEqual([23, 0]);
    });

    it('should return an empty list without skipHours', () => {
      expect(extractSkipHours(channelOf('<title>x</title>'))).toEqual([]);
    });
  });

  describe('extractSkipDays', () => {
    it('should normalise capitalisation and drop unknown names', () => {
      const channel = channelOf(
        '<skipDays><day>monday</day><day>TUESDAY</day><day>Caturday</day><day></day><day>Sunday</day></skipDays>'
      );
      expect(extractSkipDays(channel)).toEqual(['Monday', 'Tuesday', 'Sunday']);
    });
  });

  describe('extractItems', () => {
    it('should drop items without title and description and report them', () => {
      const onDrop = vi.fn();
      const channel = channelOf(
        '<item><title>One</title></item><item><link>https://example.com/2</link></item><item><description>Three</description></item>'
      );

      const items = extractItems(channel, onDrop);

      expect(items.map((item) => item.title ?? item.description)).toEqual(['One', 'Three']);
      expect(onDrop).toHaveBeenCalledTimes(1);
      expect(onDrop).toHaveBeenCalledWith('item', 'item 1 has neither title nor description');
    });

    it('should degrade malformed item structures to absence', () => {
      const onDrop = vi.fn();
      const channel = channelOf(
        '<item><title>T</title><enclosure url="u" length="-5" type="t"/><source>No url</source></item>'
      );

      const [item] = extractItems(channel, onDrop);

      expect(item.enclosure).toBeUndefined();
      expect(item.source).toBeUndefined();
      expect(onDrop.mock.calls.map(([element]) => element)).toEqual(['enclosure', 'source']);
    });
  });

  describe('extractChannel', () => {
    it('should fail fast on a missing skeleton field', () => {
      const channel = channelOf('<title>T</title><description>D</description>');
      expect(() => extractChannel(channel, vi.fn())).toThrow(MissingFieldError);
      expect(() => extractChannel(channel, vi.fn())).toThrow(
        'Missing required <link> element in RSS channel'
      );
    });

    it('should collapse empty optional text to undefined', () => {
      const channel = channelOf(
        '<title>T</title><link>L</link><description>D</description><language></language><ttl>soon</ttl>'
      );
      const built = extractChannel(channel, vi.fn());

      expect(built.language).toBeUndefined();
      expect(built.ttl).toBeUndefined();
    });
  });
});
