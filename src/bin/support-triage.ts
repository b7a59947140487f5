#!/usr/bin/env node

import { runCli } from '../cli/index';
import { formatFatalError, resolveCliErrorFormat } from '../utils/error-format';

runCli().catch((error: unknown) => {
  process.stderr.write(formatFatalError(error, resolveCliErrorFormat(process.argv.slice(2))));
  process.exitCode = 1;
});
