#!/usr/bin/env node
import { config as loadDotenv } from 'dotenv';
import { runCli } from './run.js';

async function main(): Promise<void> {
  loadDotenv();

  const interrupt = new AbortController();
  process.once('SIGINT', () => interrupt.abort());

  process.exitCode = await runCli(process.argv.slice(2), {
    signal: interrupt.signal,
  });
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
