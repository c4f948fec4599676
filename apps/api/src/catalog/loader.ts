import { readFile } from 'fs/promises';
import path from 'path';
import { logger } from '../utils/logger.js';
import { ValidationError } from '../errors.js';

/**
 * Read a catalog revision (songs.json) from disk. Relative paths resolve
 * against the working directory. Unparseable JSON is reported as a catalog
 * validation issue; a missing file is an ordinary I/O error.
 */
export async function readCatalogFile(catalogPath: string): Promise<unknown> {
  const resolved = path.resolve(process.cwd(), catalogPath);
  const content = await readFile(resolved, 'utf-8');

  try {
    const parsed: unknown = JSON.parse(content);
    logger.debug({
      path: resolved,
      entries: Array.isArray(parsed) ? parsed.length : null
    }, 'Catalog file read');
    return parsed;
  } catch (error) {
    throw new ValidationError([{
      index: -1,
      field: 'catalog',
      reason: `invalid JSON in ${path.basename(resolved)}: ${error instanceof Error ? error.message : String(error)}`,
    }]);
  }
}
