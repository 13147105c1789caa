#!/usr/bin/env node
import { main } from './cli';

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
);
