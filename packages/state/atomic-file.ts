import fs from 'fs-extra';
import path from 'path';
import type { z } from 'zod';
import { CorruptStateError } from '@tube-to-pod/errors';

/**
 * Replace `filePath` with `content` via write-temp-then-rename.
 * The temp file lives in the same directory so the rename never crosses devices;
 * readers see either the old document or the new one, never a partial write.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const directory = path.dirname(filePath);
  await fs.ensureDir(directory);
  const tempPath = path.join(
    directory,
    `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`
  );

  try {
    const handle = await fs.promises.open(tempPath, 'w');
    try {
      await handle.writeFile(content, 'utf8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.remove(tempPath);
    throw error;
  }
}

export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  await writeFileAtomic(filePath, `${JSON.stringify(value, null, 2)}\n`);
}

/**
 * Read and validate a JSON document. `undefined` when the file does not exist;
 * anything unreadable or off-schema is a CorruptStateError, never an empty default.
 */
export async function readJsonFile<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | undefined> {
  if (!(await fs.pathExists(filePath))) {
    return undefined;
  }

  const content = await fs.readFile(filePath, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new CorruptStateError(filePath, 'not valid JSON', { cause: error });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const firstIssue = parsed.error.issues[0];
    const where = firstIssue.path.join('.') || '(root)';
    throw new CorruptStateError(filePath, `${where}: ${firstIssue.message}`, { cause: parsed.error });
  }
  return parsed.data;
}
