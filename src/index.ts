#!/usr/bin/env node

import { run } from './cli.js';

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  const errorMessage = error instanceof Error ? error.message : String(error);
  process.stderr.write(`[md-table-docx] Uncaught exception: ${errorMessage}\n`);
  process.exit(1);
});

// Handle unhandled rejections
process.on('unhandledRejection', (reason) => {
  const errorMessage = reason instanceof Error ? reason.message : String(reason);
  process.stderr.write(`[md-table-docx] Unhandled rejection: ${errorMessage}\n`);
  process.exit(1);
});

run(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    const errorMessage = error instanceof Error ? error.message : String(error);
    process.stderr.write(`[md-table-docx] Fatal error: ${errorMessage}\n`);
    process.exit(1);
  });
