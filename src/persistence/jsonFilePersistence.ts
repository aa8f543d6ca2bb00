import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { WheelError } from '../types/errors';
import type { WheelPersistence } from './types';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Stores the document as pretty-printed JSON. A missing file loads as `null`;
 * unreadable JSON is reported as a persistence failure.
 */
export function createJsonFilePersistence(filePath: string): WheelPersistence {
  return {
    async load() {
      let raw: string;
      try {
        raw = await readFile(filePath, 'utf8');
      } catch (error) {
        if (isMissingFile(error)) {
          return null;
        }
        throw new WheelError('PERSISTENCE_FAILED', `Failed to read ${filePath}`, { cause: error });
      }
      try {
        return JSON.parse(raw);
      } catch (error) {
        throw new WheelError('PERSISTENCE_FAILED', `Malformed JSON in ${filePath}`, { cause: error });
      }
    },
    async save(document) {
      const tempPath = `${filePath}.tmp`;
      try {
        await mkdir(dirname(filePath), { recursive: true });
        await writeFile(tempPath, `${JSON.stringify(document, null, 2)}\n`, 'utf8');
        await rename(tempPath, filePath);
      } catch (error) {
        throw new WheelError('PERSISTENCE_FAILED', `Failed to write ${filePath}`, { cause: error });
      }
    },
  };
}
