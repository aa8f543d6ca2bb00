import { toErrorMessage } from '../types/errors';
import type { WheelLogger } from '../state/logStore';
import type { WheelDocument, WheelPersistence } from './types';

export interface DocumentSaver {
  /** Snapshots the document now and queues one save. Never rejects. */
  requestSave: () => Promise<void>;
  lastError: () => string | null;
  /** Resolves once every queued save has settled. */
  flush: () => Promise<void>;
}

interface DocumentSaverOptions {
  persistence: WheelPersistence;
  getDocument: () => WheelDocument;
  logger: WheelLogger;
}

export function createDocumentSaver({ persistence, getDocument, logger }: DocumentSaverOptions): DocumentSaver {
  let queue: Promise<void> = Promise.resolve();
  let lastError: string | null = null;

  return {
    requestSave() {
      const document = getDocument();
      queue = queue.then(async () => {
        try {
          await persistence.save(document);
          lastError = null;
        } catch (error) {
          lastError = toErrorMessage(error);
          logger.error('Failed to save wheel configuration', error);
        }
      });
      return queue;
    },
    lastError: () => lastError,
    flush: () => queue,
  };
}
