/**
 * Path Resolver
 * Layer: infra
 *
 * Provided ports:
 *   - paths.findExecutable
 *   - paths.isReadableFile
 *
 * Filesystem lookups the supervisor makes before touching any process.
 */

import * as fs from 'fs';
import * as path from 'path';

// -----------------------------------------------------------------------------
// Port: paths.findExecutable
// -----------------------------------------------------------------------------

/**
 * Resolves a command name the way `command -v` does: names containing a
 * slash are checked as given, bare names are searched on PATH in order.
 * Empty PATH entries mean the current directory.
 *
 * @returns Absolute or as-given path of the first executable match, or null
 */
export function findExecutable(
  name: string,
  pathEnv: string | undefined = process.env['PATH'],
): string | null {
  if (!name) {
    return null;
  }

  if (name.includes('/')) {
    return isExecutableFile(name) ? name : null;
  }

  for (const dir of (pathEnv ?? '').split(path.delimiter)) {
    const candidate = path.join(dir || '.', name);
    if (isExecutableFile(candidate)) {
      return candidate;
    }
  }

  return null;
}

function isExecutableFile(candidate: string): boolean {
  try {
    if (!fs.statSync(candidate).isFile()) {
      return false;
    }
    fs.accessSync(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

// -----------------------------------------------------------------------------
// Port: paths.isReadableFile
// -----------------------------------------------------------------------------

/**
 * True if the path exists, is a regular file and the current user can read it.
 */
export function isReadableFile(filePath: string): boolean {
  try {
    if (!fs.statSync(filePath).isFile()) {
      return false;
    }
    fs.accessSync(filePath, fs.constants.R_OK);
    return true;
  } catch {
    return false;
  }
}
