#!/usr/bin/env node
import { cli } from './cli.js';
import { abortRun } from './lib/api-client.js';

process.once('SIGINT', () => {
  abortRun(new Error('Interrupted'));
});

await cli.parseAsync();
