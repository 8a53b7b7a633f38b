#!/usr/bin/env node

import { runCli } from './main.js';
import { createNodeRuntime } from './runtime.js';

void runCli(process.argv, { runtime: createNodeRuntime() }).then((code) => {
  process.exitCode = code;
});
