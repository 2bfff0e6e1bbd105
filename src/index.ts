#!/usr/bin/env node
import { runCLI } from './cli.js';

runCLI(process.argv.slice(2))
  .then((code) => {
    // Not process.exit: `tl mcp` keeps serving after the command returns
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
