#!/usr/bin/env node
import { AppError, describeError } from './errors';
import { main } from './main';

main().catch((error: unknown) => {
  // The diagnostic logger may not exist yet when configuration fails.
  console.error(error instanceof AppError ? describeError(error) : error);
  process.exit(1);
});
