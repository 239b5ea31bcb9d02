import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import { loadConfig } from './config';
import { createRuntime, Runtime } from './bot';

const INITIAL_BACKOFF_MS = 1_000;
const MAX_BACKOFF_MS = 30_000;

function loadEnvFile(): void {
  const envPath = [path.resolve(process.cwd(), '.env'), path.resolve(__dirname, '../../.env')]
    .find((candidate) => fs.existsSync(candidate));

  if (envPath) {
    dotenv.config({ path: envPath, override: false });
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function pollUntilStopped(runtime: Runtime, isStopping: () => boolean): Promise<void> {
  let backoffMs = INITIAL_BACKOFF_MS;

  while (!isStopping()) {
    try {
      await runtime.logger.info('Polling started');
      await runtime.bot.start();
      if (isStopping()) return;

      await runtime.logger.warn('Polling returned without a stop request, restarting');
    } catch (error) {
      await runtime.logger.error('Polling failed, restarting after backoff', {
        error: error instanceof Error ? error.message : String(error),
        backoffMs,
      });
    }

    runtime.bot.stop();
    await delay(backoffMs);
    backoffMs = Math.min(backoffMs * 2, MAX_BACKOFF_MS);
  }
}

async function main(): Promise<void> {
  loadEnvFile();
  const config = loadConfig();
  const runtime = await createRuntime(config);

  let stopping = false;
  const stop = async (signal: NodeJS.Signals): Promise<void> => {
    if (stopping) return;
    stopping = true;

    await runtime.logger.info('Stopping moderator', { signal, pendingDeliveries: runtime.delivery.size });
    runtime.bot.stop();
    runtime.sweeper.stop();
    await runtime.delivery.drain();
    runtime.db.close();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      stop(signal).catch((error) => {
        console.error('Shutdown failed', error);
        process.exitCode = 1;
      });
    });
  }

  runtime.sweeper.runOnce();
  runtime.sweeper.start();

  await runtime.logger.info('Chat moderator started', {
    sweepIntervalSec: config.sweepIntervalSec,
    retentionDays: config.retentionDays,
    globalAdmins: config.adminUserIds.length,
    logChat: config.logChatId ?? null,
  });

  await pollUntilStopped(runtime, () => stopping);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
