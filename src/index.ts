#!/usr/bin/env node
import { createConsoleLineReader } from './cli/prompt';
import { runSession } from './cli/session';
import { logger } from './logger';

async function main(): Promise<number> {
  const reader = createConsoleLineReader();
  try {
    return await runSession(reader);
  } finally {
    reader.close();
  }
}

if (require.main === module) {
  main().then(code => {
    process.exitCode = code;
  }).catch(err => {
    logger.fatal({ err }, 'Unexpected error');
    process.exitCode = 1;
  });
}
