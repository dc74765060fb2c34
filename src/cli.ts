#!/usr/bin/env node
// src/cli.ts

import { createProgram } from './cli/commands';
import { configFromEnv } from './config/ConfigValidator';
import { RssParser } from './rss';

createProgram(RssParser.create(configFromEnv())).parse();
