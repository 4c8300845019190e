#!/usr/bin/env node

/**
 * pagepilot CLI entry point.
 * Thin wrapper; all logic delegated to core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerBatchCommand, registerReplayCommand, registerRunCommand } from './index.js';

const program = new Command();

program
  .name('pagepilot')
  .description(
    'LLM-driven browser agent. Give it a URL and a task; it decides, acts and records a replayable trace.',
  )
  .version('0.1.0');

registerRunCommand(program);
registerBatchCommand(program);
registerReplayCommand(program);

await program.parseAsync();
