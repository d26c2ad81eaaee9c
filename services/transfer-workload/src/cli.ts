#!/usr/bin/env node
import { loadRuntimeConfig } from '@fundsflow/config';
import { connectWithIdToken, describeTarget, loadDbConfig } from '@fundsflow/db';
import { createServiceLogger, log } from '@fundsflow/observability';
import { runApp } from './app.js';
import { CliUsageError, parseArgs, usage } from './parser.js';

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));

  if (parsed.kind === 'help') {
    console.log(usage());
    return;
  }

  const runtime = loadRuntimeConfig();
  const logger = createServiceLogger({
    service: 'transfer-workload',
    minLevel: parsed.verbose ? 'debug' : (runtime.LOG_LEVEL ?? 'info')
  });
  const dbConfig = loadDbConfig(runtime);

  logger.debug('cluster target', describeTarget(dbConfig));

  const result = await runApp(parsed, {
    connect: (idToken) => connectWithIdToken(dbConfig, idToken),
    logger,
    print: (line) => console.log(line),
    amount: runtime.TRANSFER_AMOUNT,
    maxRetries: runtime.TRANSFER_MAX_RETRIES
  });

  process.exitCode = result.exitCode;
}

main().catch((error: unknown) => {
  if (error instanceof CliUsageError) {
    console.error(`transfer-workload: ${error.message}`);
    console.error(usage());
    process.exitCode = 2;
    return;
  }

  log('error', 'database connection failed', {
    error: error instanceof Error ? `${error.name}: ${error.message}` : String(error)
  });
  process.exitCode = 1;
});
