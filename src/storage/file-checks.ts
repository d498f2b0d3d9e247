import { stat } from 'node:fs/promises';

/**
 * Whether `path` names an existing regular file.
 *
 * Any stat failure (missing, permission denied, dangling link) counts
 * as absent.
 */
export async function isExistingFile(path: string): Promise<boolean> {
  try {
    const stats = await stat(path);
    return stats.isFile();
  } catch {
    return false;
  }
}
