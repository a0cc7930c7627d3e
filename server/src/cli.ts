#!/usr/bin/env node
import pino from 'pino';
import { loadLogLevel } from './plugins/config.js';
import { runCli } from './cli/runCli.js';

async function main(): Promise<number> {
  // Progress logs go to stderr so that stdout carries only the summary
  const logger = pino({ name: 'delaylens', level: loadLogLevel(process.env) }, pino.destination(2));

  return runCli(process.argv.slice(2), {
    logger,
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    now: () => new Date(),
  });
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  },
);
