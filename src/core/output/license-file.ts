/**
 * Persists the rendered license.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { WriteError, ErrorCodes } from '../../utils/errors.js';

export const LICENSE_FILENAME = 'LICENSE';

/**
 * Write `LICENSE` into a directory, replacing any existing file.
 *
 * @returns Absolute path of the written file
 */
export async function writeLicenseFile(dir: string, content: string): Promise<string> {
  const filePath = path.resolve(dir, LICENSE_FILENAME);

  try {
    await fs.promises.writeFile(filePath, content, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    const errno = error instanceof Error && 'code' in error ? error.code : undefined;
    throw new WriteError(
      ErrorCodes.LICENSE_WRITE_FAILED,
      `Failed to write ${filePath}: ${reason}`,
      { path: filePath, errno }
    );
  }

  return filePath;
}
