#!/usr/bin/env node
import { runEnrichCli } from './run';

runEnrichCli(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(message);
  process.exitCode = 1;
});
