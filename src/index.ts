#!/usr/bin/env node

import pkg from '../package.json';
import { HarnessMcpServer } from './server';
import { loadConfig } from './utils/config';
import { formatErrorForResponse } from './utils/error';
import { createLogger } from './utils/logger';

function printVersion(argv: string[]): boolean {
  if (argv.some(arg => arg === '--version' || arg === '-v' || arg === '-V')) {
    console.log(pkg.version);
    return true;
  }
  return false;
}

async function main(): Promise<void> {
  if (printVersion(process.argv.slice(2))) {
    return;
  }

  let logger = createLogger();
  try {
    const config = loadConfig();
    logger = createLogger(config.logLevel);
    logger.debug('Loaded configuration', {
      serial: config.serial ?? null,
      endpoint: config.endpoint.toString(),
      testServerPort: config.testServerPort,
    });

    await new HarnessMcpServer({ config, logger }).run();
  } catch (error) {
    logger.error(`Failed to start ${pkg.name}: ${formatErrorForResponse(error)}`);
    process.exit(1);
  }
}

void main();
