#!/usr/bin/env node
// Inbox Digest - Main Entry Point
import { runCli } from './cli.js';
import { INTERRUPTED_MESSAGE } from './ui/report.js';

process.on('SIGINT', () => {
  console.log(`\n\n${INTERRUPTED_MESSAGE}`);
  process.exit(0);
});

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    console.error('Failed to run digest:', error);
    process.exit(1);
  });
