// src/rss.ts

import { extractChannel } from './core/extract/channel';
import type { DropReporter } from './core/extract/primitives';
import { RssFeed } from './core/model/Channel';
import { validateFeed } from './core/validation/ValidationEngine';
import { loadDocument } from './core/xml/DocumentLoader';
import { attribute, firstDescendant, firstDirectChild } from './core/xml/TreeAdapter';
import { validateConfig } from './config/ConfigValidator';
import type { ParserConfig } from './config/ConfigValidator';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { generateCorrelationId, withSpan } from './observability/tracing';
import { FeedError, MissingFieldError } from './utils/errors';

export type ParseResult =
  | { success: true; feed: RssFeed }
  | { success: false; error: FeedError };

export class RssParser {
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  private constructor(private readonly config: ParserConfig) {
    this.logger = new Logger(config.logging);
    this.metrics = new MetricsCollector(config.metrics);
  }

  /**
   * Create a parser from validated configuration
   *
   * @param config - Logging, metrics, tracing and input limit settings
   * @throws {z.ZodError} If the configuration is invalid
   *
   * @example
   * ```typescript
   * const parser = RssParser.create({ logging: { level: 'debug', format: 'pretty' } });
   * const feed = parser.parse(xml);
   * console.log(feed.channel.title);
   * ```
   */
  static create(config: unknown = {}): RssParser {
    return new RssParser(validateConfig(config));
  }

  /**
   * Parse an RSS 2.0 document into a validated feed
   *
   * Sequence: load → locate <rss> → locate <channel> → extract → construct → validate.
   * A call yields one complete feed or one error; there are no partial results.
   *
   * @param text - Complete document text
   * @returns Immutable, validated feed
   * @throws {InputError} If the text is blank or declares a DOCTYPE/ENTITY
   * @throws {XmlSyntaxError} If the text is not well-formed XML
   * @throws {MissingFieldError} If <rss>, <channel> or the channel title/link/description is missing
   * @throws {ValidationError} If the assembled feed violates an invariant
   */
  parse(text: string): RssFeed {
    const correlationId = generateCorrelationId();
    const startedAt = Date.now();
    const length = typeof text === 'string' ? text.length : 0;

    this.logger.debug('RSS parse started', { correlationId, length });

    try {
      const feed = withSpan(
        'rss.parse',
        (span) => {
          const result = this.run(text, correlationId);
          span?.setAttribute('rss.item_count', result.channel.items.length);
          return result;
        },
        { 'rss.correlation_id': correlationId, 'rss.document_length': length },
        this.config.tracing?.enabled
      );

      this.metrics.incrementCounter('parse_total', { outcome: 'success' });
      this.metrics.recordLatency('parse_duration', Date.now() - startedAt, { outcome: 'success' });
      this.metrics.recordGauge('items_parsed', feed.channel.items.length);
      this.logger.debug('RSS parse completed', {
        correlationId,
        feedTitle: feed.channel.title,
        itemCount: feed.channel.items.length,
      });

      return feed;
    } catch (error) {
      const outcome = error instanceof FeedError ? error.code : 'UNEXPECTED';
      this.metrics.incrementCounter('parse_total', { outcome });
      this.metrics.recordLatency('parse_duration', Date.now() - startedAt, { outcome });
      this.logger.warn('RSS parse failed', { correlationId, outcome, error });
      throw error;
    }
  }

  /**
   * Same as parse(), but reports feed errors as a value instead of throwing
   */
  parseSafe(text: string): ParseResult {
    try {
      return { success: true, feed: this.parse(text) };
    } catch (error) {
      if (error instanceof FeedError) {
        return { success: false, error };
      }
      throw error;
    }
  }

  /**
   * Prometheus exposition text for this parser's metrics
   */
  async getMetrics(): Promise<string> {
    return this.metrics.getMetrics();
  }

  private run(text: string, correlationId: string): RssFeed {
    const document = loadDocument(text, this.config.limits);

    const rss = firstDescendant(document.nodes, 'rss');
    if (!rss) {
      throw new MissingFieldError('rss', 'Missing <rss> root element');
    }

    const channelNode = firstDirectChild(rss, 'channel');
    if (!channelNode) {
      throw new MissingFieldError('channel', 'Missing <channel> element inside <rss>');
    }

    const onDrop: DropReporter = (element, reason) => {
      this.metrics.incrementCounter('structures_dropped', { element });
      this.logger.debug('Dropped malformed element', { correlationId, element, reason });
    };

    const feed = new RssFeed({
      channel: extractChannel(channelNode, onDrop),
      version: attribute(rss, 'version') || undefined,
    });

    return validateFeed(feed);
  }
}

let defaultParser: RssParser | undefined;

/**
 * Parse an RSS 2.0 document with a silent, metrics-free parser.
 * Pass `config` to get a dedicated parser for this call.
 *
 * @example
 * ```typescript
 * const feed = parseRss(xml);
 * for (const item of feed.channel.items) {
 *   console.log(item.pubDate, item.title);
 * }
 * ```
 */
export function parseRss(text: string, config?: unknown): RssFeed {
  if (config !== undefined) {
    return RssParser.create(config).parse(text);
  }
  if (!defaultParser) {
    defaultParser = RssParser.create({
      logging: { silent: true },
      metrics: { enabled: false },
    });
  }
  return defaultParser.parse(text);
}
