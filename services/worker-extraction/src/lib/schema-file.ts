/**
 * Locates schema/init.sql whether the worker runs from its sources or from
 * the compiled output under dist/.
 */

import fs from 'fs';
import path from 'path';

export const SCHEMA_FILE = 'init.sql';

export function schemaFileCandidates(libDir: string, cwd: string): string[] {
  return [
    // Next to the sources
    path.join(libDir, '..', 'schema', SCHEMA_FILE),
    // From dist/services/worker-extraction/src/lib back to the sources
    path.join(libDir, '../../../../../services/worker-extraction/src/schema', SCHEMA_FILE),
    // From the repository root
    path.join(cwd, 'services/worker-extraction/src/schema', SCHEMA_FILE),
  ];
}

/**
 * @throws Error listing every path tried when none exists
 */
export function findSchemaFile(libDir: string = __dirname, cwd: string = process.cwd()): string {
  const candidates = schemaFileCandidates(libDir, cwd);
  const found = candidates.find((candidate) => fs.existsSync(candidate));
  if (found === undefined) {
    throw new Error(`Schema file not found; tried ${candidates.join(', ')}`);
  }
  return found;
}
