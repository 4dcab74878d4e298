#!/usr/bin/env node
import { run } from 'cmd-ts';
import { cli } from './app.js';

/**
 * torrentwatch - hands new episodes from torrent RSS feeds to a torrent client
 */
await run(cli, process.argv.slice(2));
