#!/usr/bin/env node
/**
 * Registration Entry Point
 *
 * Built as: dist/register-entry.js
 * Usage: RUN SUPERVISOR_JOB_COMMAND="bash /app/update.sh" container-supervisor-register
 */

import { registerMain } from './register';

void registerMain().then((exitCode) => {
  process.exitCode = exitCode;
});
