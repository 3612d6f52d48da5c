/**
 * Configuration Store
 *
 * Durable KEY=value record of the feeder profile and credentials.
 * - load() always reads the file; nothing is cached between calls
 * - save() replaces the file atomically
 * - backups are append-only copies named .env.backup.YYYYMMDD_HHMMSS
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConsoleError } from '../errors/console-error';
import { ErrorCode } from '../errors/error-codes';
import { atomicWriteFileSync } from '../logging/atomic-file-writer';
import { getConsoleLogger, type ConsoleLogger } from '../logging/console-logger';
import {
  emptySnapshot,
  parseEnv,
  serializeEnv,
  upsert as upsertSnapshot,
  type ConfigSnapshot,
} from './env-file';

export interface BackupRecord {
  path: string;
  createdAt: Date;
  reason: string;
  /** Exact bytes that were backed up */
  content: string;
}

export interface ConfigurationStoreOptions {
  envFile: string;
  /** Directory backups are written to (default: next to envFile) */
  backupDir?: string;
  logger?: ConsoleLogger;
  clock?: () => Date;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Local time stamp in YYYYMMDD_HHMMSS form
 */
export function formatBackupStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export class ConfigurationStore {
  readonly envFile: string;
  readonly backupDir: string;
  private readonly logger: ConsoleLogger;
  private readonly clock: () => Date;

  constructor(options: ConfigurationStoreOptions) {
    this.envFile = options.envFile;
    this.backupDir = options.backupDir ?? path.dirname(options.envFile);
    this.logger = options.logger ?? getConsoleLogger();
    this.clock = options.clock ?? (() => new Date());
  }

  exists(): boolean {
    return fs.existsSync(this.envFile);
  }

  /**
   * Read the current snapshot from disk.
   * @returns undefined when no configuration exists
   * @throws ConsoleError E101 when the file cannot be read or parsed
   */
  load(): ConfigSnapshot | undefined {
    if (!this.exists()) {
      return undefined;
    }
    let content: string;
    try {
      content = fs.readFileSync(this.envFile, 'utf-8');
    } catch (error) {
      throw new ConsoleError(
        ErrorCode.E101_MALFORMED_CONFIGURATION,
        `${this.envFile}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    return parseEnv(content, this.envFile);
  }

  /**
   * load(), or an empty snapshot when no configuration exists yet
   */
  loadOrEmpty(): ConfigSnapshot {
    return this.load() ?? emptySnapshot();
  }

  upsert(snapshot: ConfigSnapshot, changes: Readonly<Record<string, string>>): ConfigSnapshot {
    return upsertSnapshot(snapshot, changes);
  }

  /**
   * Atomically replace the configuration file
   * @throws ConsoleError E102
   */
  save(snapshot: ConfigSnapshot): void {
    const result = atomicWriteFileSync(this.envFile, serializeEnv(snapshot), { mode: 0o600 });
    if (!result.success) {
      throw new ConsoleError(
        ErrorCode.E102_CONFIGURATION_WRITE_FAILURE,
        `${this.envFile}: ${result.error?.message ?? 'unknown error'}`
      );
    }
    this.logger.info('CONFIG', `Saved ${path.basename(this.envFile)}`, {
      path: this.envFile,
      retryCount: result.retryCount,
    });
  }

  /**
   * Write a backup of the given snapshot
   * @throws ConsoleError E103
   */
  backup(snapshot: ConfigSnapshot, reason: string = 'manual'): BackupRecord {
    return this.writeBackup(serializeEnv(snapshot), reason);
  }

  /**
   * Byte copy of the file as it is on disk, for configurations that cannot be parsed
   * @returns undefined when there is no file
   */
  backupRaw(reason: string = 'unreadable configuration'): BackupRecord | undefined {
    if (!this.exists()) {
      return undefined;
    }
    let content: string;
    try {
      content = fs.readFileSync(this.envFile, 'utf-8');
    } catch (error) {
      throw new ConsoleError(
        ErrorCode.E103_BACKUP_FAILURE,
        `${this.envFile}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    return this.writeBackup(content, reason);
  }

  /**
   * Destructive update: load, back up, then apply and save.
   * Nothing is written when the backup fails.
   */
  applyDestructive(
    changes: Readonly<Record<string, string>>,
    reason: string
  ): { snapshot: ConfigSnapshot; backup?: BackupRecord } {
    const current = this.load();
    const backup = current ? this.backup(current, reason) : undefined;
    const snapshot = this.upsert(current ?? emptySnapshot(), changes);
    this.save(snapshot);
    return { snapshot, backup };
  }

  /**
   * Backup file paths, oldest first
   */
  listBackups(): string[] {
    if (!fs.existsSync(this.backupDir)) {
      return [];
    }
    const prefix = `${path.basename(this.envFile)}.backup.`;
    return fs
      .readdirSync(this.backupDir)
      .filter((name) => name.startsWith(prefix))
      .sort()
      .map((name) => path.join(this.backupDir, name));
  }

  /**
   * Remove the configuration file. It is backed up first unless `backup`
   * already holds its content. Backups are kept.
   */
  remove(backup: BackupRecord | undefined = this.backupRaw('uninstall')): BackupRecord | undefined {
    if (this.exists()) {
      fs.rmSync(this.envFile, { force: true });
      this.logger.info('CONFIG', `Removed ${path.basename(this.envFile)}`, { backup: backup?.path });
    }
    return backup;
  }

  private writeBackup(content: string, reason: string): BackupRecord {
    const createdAt = this.clock();
    const base = path.join(this.backupDir, `${path.basename(this.envFile)}.backup.${formatBackupStamp(createdAt)}`);

    try {
      fs.mkdirSync(this.backupDir, { recursive: true });
      for (let attempt = 0; ; attempt++) {
        const candidate = attempt === 0 ? base : `${base}_${attempt}`;
        try {
          // 'wx' never overwrites an earlier backup
          fs.writeFileSync(candidate, content, { encoding: 'utf-8', flag: 'wx', mode: 0o600 });
          this.logger.info('BACKUP', `Backed up configuration to ${path.basename(candidate)}`, {
            path: candidate,
            reason,
          });
          return { path: candidate, createdAt, reason, content };
        } catch (error) {
          if (!(error instanceof Error && 'code' in error && error.code === 'EEXIST')) {
            throw error;
          }
        }
      }
    } catch (error) {
      throw new ConsoleError(
        ErrorCode.E103_BACKUP_FAILURE,
        `${this.backupDir}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}
