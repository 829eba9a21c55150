/**
 * Snapshot Manager — full copies of a workspace tree
 *
 * Snapshots live side by side under one directory, named
 * `{env}-{YYYYMMDDTHHMMSSZ}`, so a plain lexicographic sort is also
 * chronological. A snapshot is never written to after it is taken.
 */

import fs from 'node:fs';
import path from 'node:path';

export type WorkspaceResolver = (env: string) => string;

export interface SnapshotManagerOptions {
  snapshotDir: string;
  workspaceRoot: WorkspaceResolver;
  now?: () => Date;
}

export function formatSnapshotTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z').replace(/[-:]/g, '');
}

export class SnapshotManager {
  private snapshotDir: string;
  private workspaceRoot: WorkspaceResolver;
  private now: () => Date;

  constructor(options: SnapshotManagerOptions) {
    this.snapshotDir = options.snapshotDir;
    this.workspaceRoot = options.workspaceRoot;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Copy the live workspace (empty directories included) into a new
   * snapshot directory and return its path.
   */
  snapshot(env: string): string {
    const source = this.workspaceRoot(env);
    const target = this.nextSnapshotPath(env);

    fs.mkdirSync(this.snapshotDir, { recursive: true });
    fs.cpSync(source, target, { recursive: true, errorOnExist: true, force: false, verbatimSymlinks: true });
    return target;
  }

  /**
   * Replace the live workspace with the snapshot's tree. The snapshot is
   * checked before anything is removed.
   */
  restore(env: string, snapshotPath: string): void {
    const stat = fs.statSync(snapshotPath, { throwIfNoEntry: false });
    if (!stat?.isDirectory()) {
      throw new Error(`Snapshot not found: ${snapshotPath}`);
    }

    const workspace = this.workspaceRoot(env);
    fs.rmSync(workspace, { recursive: true, force: true });
    fs.cpSync(snapshotPath, workspace, { recursive: true, verbatimSymlinks: true });
  }

  /** Snapshot names, newest first, optionally only for one environment. */
  list(env?: string): string[] {
    if (!fs.existsSync(this.snapshotDir)) return [];

    return fs.readdirSync(this.snapshotDir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .filter((name) => env === undefined || name.startsWith(`${env}-`))
      .sort()
      .reverse();
  }

  latest(env: string): string | null {
    const [newest] = this.list(env);
    return newest === undefined ? null : this.pathOf(newest);
  }

  pathOf(name: string): string {
    return path.join(this.snapshotDir, name);
  }

  private nextSnapshotPath(env: string): string {
    const base = `${env}-${formatSnapshotTimestamp(this.now())}`;
    let candidate = this.pathOf(base);
    // Same second as an earlier snapshot: `_01`, `_02`, ... still sort after it.
    for (let n = 1; fs.existsSync(candidate); n++) {
      candidate = this.pathOf(`${base}_${String(n).padStart(2, '0')}`);
    }
    return candidate;
  }
}
