#!/usr/bin/env node
import { config } from 'dotenv';
import { resolve } from 'path';
import { loadConfig } from '../config.js';
import { setLogLevel } from '../utils/logger.js';
import { runCli } from '../cli.js';

config({ path: resolve(process.cwd(), '.env') });
config({ path: resolve(process.cwd(), '../.env') });

const appConfig = loadConfig();
setLogLevel(appConfig.LOG_LEVEL);

process.exitCode = runCli(process.argv.slice(2), appConfig, {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
});
