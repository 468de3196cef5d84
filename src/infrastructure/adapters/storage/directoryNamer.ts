// Directory Namer - project root discovery and session/pod/worker directories
// Layout: <root>/.agent-harness/sessions/<session>/pods/<pod>/workers/<worker>/

import * as fs from 'fs/promises';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { ClockPort } from '../../../domain/ports/clock';
import { LoggerPort } from '../../../domain/ports/logger';
import { HARNESS_DIR, PODS_DIR, SESSIONS_DIR, WORKERS_DIR } from '../../../domain/types/types';
import { errnoCode } from '../../../domain/types/errors';
import { systemClock, toDirectoryTimestamp } from '../clock/systemClock';
import { defaultLogger } from '../logging/loggerAdapter';

export const PROJECT_ROOT_MARKERS = ['.git', 'package.json', 'pyproject.toml'] as const;

export const HARNESS_GITIGNORE = 'sessions/\n';

export interface DirectoryNamerOptions {
  clock?: ClockPort;
  idGenerator?: () => string;
  markers?: readonly string[];
  logger?: LoggerPort;
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Reduce a user-supplied name to characters that are safe in a directory name
 */
export function sanitizeName(name: string): string {
  return name
    .trim()
    .replace(/[^A-Za-z0-9_-]+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '') || 'unnamed';
}

export class DirectoryNamer {
  private clock: ClockPort;
  private idGenerator: () => string;
  private markers: readonly string[];
  private logger: LoggerPort;

  constructor(options: DirectoryNamerOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.idGenerator = options.idGenerator ?? randomUUID;
    this.markers = options.markers ?? PROJECT_ROOT_MARKERS;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Walk upward from startPath to the first directory holding a project marker.
   * Falls back to startPath itself when the filesystem root is reached.
   */
  async findProjectRoot(startPath: string): Promise<string> {
    let current = path.resolve(startPath);

    while (true) {
      for (const marker of this.markers) {
        if (await pathExists(path.join(current, marker))) {
          return current;
        }
      }

      const parent = path.dirname(current);
      if (parent === current) {
        this.logger.logVerbose('DirectoryNamer', 'No project marker found, using start path', { start_path: startPath });
        return startPath;
      }
      current = parent;
    }
  }

  async createSessionDir(root: string, agentName: string): Promise<string> {
    const harnessDir = path.join(root, HARNESS_DIR);
    await fs.mkdir(harnessDir, { recursive: true });

    const gitignorePath = path.join(harnessDir, '.gitignore');
    try {
      await fs.writeFile(gitignorePath, HARNESS_GITIGNORE, { encoding: 'utf-8', flag: 'wx' });
    } catch (error) {
      if (errnoCode(error) !== 'EEXIST') throw error;
    }

    const sessionsDir = path.join(harnessDir, SESSIONS_DIR);
    await fs.mkdir(sessionsDir, { recursive: true });

    const name = `agent-${sanitizeName(agentName)}-session-${this.idGenerator()}-${this.timestamp()}`;
    const sessionDir = path.join(sessionsDir, name);
    await fs.mkdir(sessionDir);

    this.logger.logVerbose('DirectoryNamer', 'Session directory created', { session_dir: sessionDir });
    return sessionDir;
  }

  async createPodDir(sessionDir: string, podName: string): Promise<string> {
    return this.createChildDir(path.join(sessionDir, PODS_DIR), `pod-${sanitizeName(podName)}`);
  }

  async createWorkerDir(podDir: string, workerId: string): Promise<string> {
    return this.createChildDir(path.join(podDir, WORKERS_DIR), `worker-${sanitizeName(workerId)}`);
  }

  private async createChildDir(parentDir: string, prefix: string): Promise<string> {
    await fs.mkdir(parentDir, { recursive: true });

    // Timestamps alone collide within a millisecond; the suffix keeps names unique
    const name = `${prefix}-${this.timestamp()}-${this.shortId()}`;
    const dir = path.join(parentDir, name);
    await fs.mkdir(dir);

    this.logger.logVerbose('DirectoryNamer', 'Directory created', { dir });
    return dir;
  }

  private timestamp(): string {
    return toDirectoryTimestamp(this.clock.now());
  }

  private shortId(): string {
    return this.idGenerator().replace(/-/g, '').slice(0, 8);
  }
}
