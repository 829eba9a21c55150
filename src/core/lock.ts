import fs from 'node:fs';
import path from 'node:path';
import { isErrno } from '../sandbox/confine.js';

export interface EnvLock {
  release(): void;
}

export interface EnvLockOptions {
  lockDir: string;
  currentPid?: number;
  isProcessAlive?: (pid: number) => boolean;
}

export function getEnvLockPath(env: string, lockDir: string): string {
  const safeEnv = env.replace(/[^a-zA-Z0-9_.-]/g, '_');
  return path.join(lockDir, `${safeEnv}.lock`);
}

/**
 * One in-flight batch or restore per environment. The lock is a pid file
 * created exclusively; a file left by a dead process is taken over.
 */
export function acquireEnvLock(env: string, options: EnvLockOptions): EnvLock {
  const currentPid = options.currentPid ?? process.pid;
  const lockPath = getEnvLockPath(env, options.lockDir);
  const isProcessAlive = options.isProcessAlive ?? defaultIsProcessAlive;

  fs.mkdirSync(options.lockDir, { recursive: true });

  for (let attempt = 0; attempt < 2; attempt += 1) {
    try {
      const fd = fs.openSync(lockPath, 'wx', 0o600);
      fs.writeFileSync(fd, `${currentPid}\n`, 'utf-8');
      fs.closeSync(fd);
      let released = false;
      return {
        release: () => {
          if (released) return;
          released = true;
          releaseEnvLock(lockPath, currentPid);
        },
      };
    } catch (err) {
      if (!isErrno(err, 'EEXIST')) {
        throw err;
      }

      const existingPid = readLockPid(lockPath);
      if (existingPid !== null && isProcessAlive(existingPid)) {
        throw new Error(`Environment ${env} is busy (pid ${existingPid})`);
      }
      fs.rmSync(lockPath, { force: true });
    }
  }

  throw new Error(`Unable to acquire lock for environment ${env} at ${lockPath}`);
}

export function withEnvLock<T>(env: string, options: EnvLockOptions, fn: () => T): T {
  const lock = acquireEnvLock(env, options);
  try {
    return fn();
  } finally {
    lock.release();
  }
}

function releaseEnvLock(lockPath: string, expectedPid: number): void {
  if (readLockPid(lockPath) !== expectedPid) return;
  fs.rmSync(lockPath, { force: true });
}

function readLockPid(lockPath: string): number | null {
  let raw: string;
  try {
    raw = fs.readFileSync(lockPath, 'utf-8').trim();
  } catch {
    return null;
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) return null;
  return parsed;
}

function defaultIsProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return !isErrno(err, 'ESRCH');
  }
}
