// Atomic File Store - JSON documents on the local filesystem
// Temp file + rename for atomic replacement, proper-lockfile for exclusive rewrites
// No retries: any failure surfaces to the caller

import * as fs from 'fs/promises';
import * as path from 'path';
import { randomUUID } from 'crypto';
import lockfile from 'proper-lockfile';
import { FileStorePort } from '../../../domain/ports/fileStore';
import { LoggerPort } from '../../../domain/ports/logger';
import { DecodeError, NotFoundError, errnoCode, errorMessage } from '../../../domain/types/errors';
import { defaultLogger } from '../logging/loggerAdapter';

// Blocks for a bounded time; the lock is stale after 10s if its holder died
export const LOCK_OPTIONS = {
  realpath: false,
  stale: 10000,
  retries: {
    retries: 200,
    factor: 1.2,
    minTimeout: 5,
    maxTimeout: 200,
  },
};

export function serializeDocument(doc: unknown): string {
  const serialized = JSON.stringify(doc, null, 2);
  if (serialized === undefined) {
    throw new TypeError('Document is not JSON-serializable');
  }
  return serialized + '\n';
}

export class AtomicFileStore implements FileStorePort {
  constructor(private logger: LoggerPort = defaultLogger) {}

  async writeAtomic(filePath: string, doc: unknown): Promise<void> {
    const startTime = Date.now();
    const dir = path.dirname(filePath);
    await fs.mkdir(dir, { recursive: true });

    // Same directory as the target so the rename never crosses filesystems
    const tempPath = path.join(dir, `.${path.basename(filePath)}.${randomUUID()}.tmp`);

    try {
      await fs.writeFile(tempPath, serializeDocument(doc), 'utf-8');
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      this.logger.logVerbose('AtomicFileStore', 'Atomic write failed, temp file removed', {
        file: filePath,
        error: errorMessage(error),
      });
      throw error;
    }

    this.logger.logPerformance('[AtomicFileStore] WriteAtomic', Date.now() - startTime, { file: filePath });
  }

  async writeExclusive(filePath: string, doc: unknown): Promise<void> {
    const startTime = Date.now();
    const content = serializeDocument(doc);
    await fs.mkdir(path.dirname(filePath), { recursive: true });

    // Set from proper-lockfile's timer when the lock is lost; the default handler would throw uncaught
    const lockState: { compromised?: Error } = {};
    const release = await lockfile.lock(filePath, {
      ...LOCK_OPTIONS,
      onCompromised: (error: Error) => {
        lockState.compromised = error;
        this.logger.logError('AtomicFileStore', `Lock compromised for ${filePath}`, error);
      },
    });
    try {
      // Truncation happens only after the lock is held
      await fs.writeFile(filePath, content, { encoding: 'utf-8', flag: 'w' });
    } finally {
      // A compromised lock is already released
      if (!lockState.compromised) {
        await release();
      }
    }
    if (lockState.compromised) {
      throw lockState.compromised;
    }

    this.logger.logPerformance('[AtomicFileStore] WriteExclusive', Date.now() - startTime, { file: filePath });
  }

  async read(filePath: string): Promise<unknown> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        throw new NotFoundError(filePath);
      }
      throw error;
    }

    try {
      return JSON.parse(raw);
    } catch (error) {
      throw new DecodeError(filePath, error);
    }
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async listDirectories(dirPath: string): Promise<string[]> {
    try {
      const entries = await fs.readdir(dirPath, { withFileTypes: true });
      return entries
        .filter(entry => entry.isDirectory())
        .map(entry => entry.name)
        .sort();
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }

  async remove(targetPath: string): Promise<void> {
    await fs.rm(targetPath, { recursive: true, force: true });
  }
}
