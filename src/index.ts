#!/usr/bin/env node

import dotenv from 'dotenv';
import chalk from 'chalk';
import { createProgram } from './cli';
import { loadConfig } from './config/app';
import { createHarness, type Harness } from './harness';
import { errorMessage } from './utils/errors';
import { getLogger } from './utils/simple-logger';

dotenv.config();

const logger = getLogger('index', 'main');

let harness: Harness | null = null;
const getHarness = (): Harness => {
  if (!harness) {
    harness = createHarness(loadConfig());
  }
  return harness;
};

async function main() {
  console.log(chalk.bold.blue('🚀 Cold Start Benchmark'));
  console.log(chalk.gray('═'.repeat(50)));

  await createProgram(getHarness).parseAsync(process.argv);
}

// Handle process interruption
process.on('SIGINT', () => {
  console.log(chalk.yellow('\n\n⚠️  Benchmark interrupted by user'));
  process.exit(130);
});

// Run the main function
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(chalk.red(`❌ Benchmark failed: ${errorMessage(error)}`));
    logger.error('Benchmark failed', error instanceof Error ? error : new Error(errorMessage(error)));
    process.exit(1);
  });
}
