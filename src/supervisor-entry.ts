#!/usr/bin/env node
/**
 * Supervisor Entry Point
 *
 * Built as: dist/supervisor-entry.js
 * Usage: ENTRYPOINT ["container-supervisor"], CMD ["streamlit", "run", "app.py"]
 */

import { main } from './main';
import { errorMessage } from './utils';

main(process.argv.slice(2))
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((err: unknown) => {
    console.error(`Supervisor error: ${errorMessage(err)}`);
    process.exit(1);
  });
