/**
 * plangate snapshots — list snapshots, newest first
 * plangate restore <env> [snapshot] — roll a workspace back
 */

import path from 'node:path';
import { ensureLayout, resolveLayout } from '../core/layout.js';
import { Sandbox } from '../core/sandbox.js';
import { errorMessage, parseEnvironment, resolveSnapshotArg } from '../cli/utils.js';

interface SnapshotsOptions {
  env?: string;
}

export async function snapshotsCommand(options: SnapshotsOptions): Promise<void> {
  try {
    const env = options.env === undefined ? undefined : parseEnvironment(options.env);
    const sandbox = new Sandbox(resolveLayout());
    const names = sandbox.snapshots.list(env);

    if (names.length === 0) {
      console.log(env
        ? `  No ${env} snapshots yet. Run a plan to create one automatically.`
        : '  No snapshots yet. Run a plan to create one automatically.');
      return;
    }

    console.log('');
    console.log(`  Snapshots (${names.length} total):`);
    for (const name of names) {
      console.log(`    ${name}`);
    }
    console.log('');
  } catch (err) {
    console.error(`  ❌ ${errorMessage(err)}`);
    process.exit(1);
  }
}

export async function restoreCommand(envArg: string, snapshot?: string): Promise<void> {
  try {
    const env = parseEnvironment(envArg);
    const layout = resolveLayout();
    ensureLayout(layout);

    const sandbox = new Sandbox(layout);
    const snapshotPath = snapshot
      ? resolveSnapshotArg(layout.snapshotDir, snapshot)
      : sandbox.snapshots.latest(env);

    if (!snapshotPath) {
      console.error(`  ❌ No ${env} snapshots to restore.`);
      process.exit(1);
    }

    sandbox.rollback(env, snapshotPath);
    console.log(`  ✅ Restored snapshot: ${path.basename(snapshotPath)}`);
  } catch (err) {
    console.error(`  ❌ ${errorMessage(err)}`);
    process.exit(1);
  }
}
