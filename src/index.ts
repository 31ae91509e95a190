#!/usr/bin/env node
import { run } from './cli';
import { describeError, logError } from './logger';

const init = async () => {
  process.exitCode = await run(process.argv.slice(2));
};

init().catch((error: unknown) => {
  logError(describeError(error));
  process.exitCode = 1;
});
