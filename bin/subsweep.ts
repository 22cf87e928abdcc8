#!/usr/bin/env node
import { main } from '../lib/cli';
import logger from '../lib/logger';

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logger.fatal({ err }, 'unexpected failure');
    process.exitCode = 1;
  },
);
