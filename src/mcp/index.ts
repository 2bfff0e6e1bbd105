#!/usr/bin/env node
import { Command } from 'commander';
import { DEFAULT_STATE_DIR } from '../state/index.js';
import { startMCPServer } from './server.js';

const program = new Command()
  .name('tl-mcp')
  .description('Serve the task tracker to agents over MCP (stdio)')
  .option('--state-dir <path>', 'State directory', DEFAULT_STATE_DIR)
  .option('--config <path>', 'Tracker config file')
  .option('--debug', 'Write a debug trace under <state-dir>/debug', false)
  .parse();

const opts = program.opts<{ stateDir: string; config?: string; debug: boolean }>();

startMCPServer({ stateDir: opts.stateDir, configPath: opts.config, debug: opts.debug }).catch(
  (error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  }
);
