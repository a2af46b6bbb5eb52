#!/usr/bin/env node
import { run } from '../lib/cli';
import logger from '../lib/logger';

void run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logger.fatal({ err }, 'delegation check failed unexpectedly');
    process.exitCode = 1;
  },
);
