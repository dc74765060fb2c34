// src/index.ts

export { RssParser, parseRss } from './rss';
export type { ParseResult } from './rss';
export { parseRfc822Date, parseOptionalRfc822Date } from './core/date/Rfc822Date';
export type { FeedTimestamp } from './core/date/types';
export { RssFeed, Channel, Item, RSS_VERSION } from './core/model/Channel';
export {
  Category,
  Guid,
  Enclosure,
  Source,
  Cloud,
  Image,
  TextInput,
} from './core/model/structures';
export { WEEKDAYS } from './core/model/types';
export type {
  Weekday,
  CategoryInit,
  GuidInit,
  EnclosureInit,
  SourceInit,
  CloudInit,
  ImageInit,
  TextInputInit,
  ItemInit,
  ChannelInit,
} from './core/model/types';
export { validateFeed, collectViolations } from './core/validation/ValidationEngine';
export { validateConfig, validateConfigSafe } from './config/ConfigValidator';
export type { ParserConfig } from './config/ConfigValidator';
export type { LoggerConfig } from './observability/Logger';
export type { MetricsConfig } from './observability/MetricsCollector';

// Export error classes for error handling
export {
  FeedError,
  InputError,
  XmlSyntaxError,
  MissingFieldError,
  ValidationError,
  DateGrammarError,
} from './utils/errors';
