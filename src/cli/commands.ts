// src/cli/commands.ts

import * as fs from 'fs';
import * as path from 'path';
import { Command } from 'commander';
import type { RssFeed } from '../core/model/Channel';
import { RssParser } from '../rss';

export interface CliOutput {
  out(line: string): void;
  err(line: string): void;
}

const consoleOutput: CliOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Coarse pre-filter applied before handing a file to the parser
 */
export function looksLikeRss(content: string): boolean {
  return content.includes('<rss');
}

/**
 * Channel title followed by one `- <pubDate>: <title>` line per item
 */
export function formatFeed(feed: RssFeed, origin?: string): string[] {
  const heading = origin
    ? `Feed Title: ${feed.channel.title} (from ${origin})`
    : `Feed Title: ${feed.channel.title}`;
  return [
    heading,
    'Items:',
    ...feed.channel.items.map((item) => `- ${item.pubDate ?? 'None'}: ${item.title ?? 'None'}`),
  ];
}

/**
 * @returns false when the file was not an RSS document or failed to parse
 */
export function parseFile(filePath: string, parser: RssParser, output: CliOutput): boolean {
  const content = fs.readFileSync(filePath, 'utf-8');

  if (!looksLikeRss(content)) {
    output.err('The provided file does not appear to be a valid RSS feed.');
    return false;
  }

  const result = parser.parseSafe(content);
  if (!result.success) {
    output.err(`Error parsing ${filePath}: ${result.error.message}`);
    return false;
  }

  formatFeed(result.feed).forEach((line) => output.out(line));
  return true;
}

/**
 * Parse every file in a directory (sorted by name). Failures are reported
 * and the run continues.
 *
 * @returns Number of feeds parsed successfully
 */
export function parseDirectory(dirPath: string, parser: RssParser, output: CliOutput): number {
  const entries = fs
    .readdirSync(dirPath, { withFileTypes: true })
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();

  let parsed = 0;
  entries.forEach((name, index) => {
    const label = `[${index + 1}]`;
    const filePath = path.join(dirPath, name);
    const content = fs.readFileSync(filePath, 'utf-8');

    if (!looksLikeRss(content)) {
      output.err(`${label} ${name}: not a valid RSS feed`);
      return;
    }

    const result = parser.parseSafe(content);
    if (!result.success) {
      output.err(`${label} Error parsing ${filePath}: ${result.error.message}`);
      return;
    }

    output.out(`\n\n-------\n\n${label}`);
    formatFeed(result.feed, name).forEach((line) => output.out(line));
    parsed++;
  });
  return parsed;
}

export function createProgram(parser: RssParser, output: CliOutput = consoleOutput): Command {
  const program = new Command();

  program
    .name('rss-feed-core')
    .description('Parse RSS 2.0 documents and print their items');

  program
    .command('parse')
    .description('Parse the RSS feed at FEED_PATH and print the titles of its items')
    .argument('<feed_path>', 'Path to an RSS 2.0 document')
    .action((feedPath: string) => {
      if (!parseFile(feedPath, parser, output)) {
        process.exitCode = 1;
      }
    });

  program
    .command('parse-dir')
    .description('Parse every RSS feed in FEED_DIR_PATH and print the titles of their items')
    .argument('<feed_dir_path>', 'Directory of RSS 2.0 documents')
    .action((feedDirPath: string) => {
      parseDirectory(feedDirPath, parser, output);
    });

  return program;
}
