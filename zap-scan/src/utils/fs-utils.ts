import { mkdir, stat, writeFile } from 'fs/promises';
import { dirname } from 'path';

/**
 * Check if a path is accessible
 */
export async function isAccessible(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write a file, creating its parent directories first
 */
export async function writeFileWithParents(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, 'utf-8');
}
