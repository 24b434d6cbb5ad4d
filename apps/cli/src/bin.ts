#!/usr/bin/env node

import { run } from './index.js';

const code = await run(process.argv.slice(2), {
  stdout: (message) => process.stdout.write(message),
  stderr: (message) => process.stderr.write(message),
});
process.exitCode = code;
