#!/usr/bin/env node
import { Logger } from 'homebridge/lib/logger.js';

import { runCli } from '../cli.js';

if (process.env.TCC_DEBUG) {
  Logger.setDebugEnabled(true);
}

process.exitCode = await runCli(process.env, Logger.withPrefix('tcc-zones'));
