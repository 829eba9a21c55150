/**
 * On-disk layout under the plangate home ($PLANGATE_HOME or ~/.plangate):
 *
 *   policy.yml
 *   workspaces/{dev,staging,prod}/
 *   snapshots/{env}-{timestamp}/
 *   logs/actions.jsonl
 *   locks/{env}.lock
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ENVIRONMENTS, type Environment } from './types.js';

export interface SandboxLayout {
  home: string;
  policyPath: string;
  workspacesDir: string;
  snapshotDir: string;
  logPath: string;
  lockDir: string;
}

export function defaultHome(): string {
  return process.env.PLANGATE_HOME || path.join(os.homedir(), '.plangate');
}

export function resolveLayout(home: string = defaultHome()): SandboxLayout {
  const root = path.resolve(home);
  return {
    home: root,
    policyPath: path.join(root, 'policy.yml'),
    workspacesDir: path.join(root, 'workspaces'),
    snapshotDir: path.join(root, 'snapshots'),
    logPath: path.join(root, 'logs', 'actions.jsonl'),
    lockDir: path.join(root, 'locks'),
  };
}

export function workspaceRoot(layout: SandboxLayout, env: Environment): string {
  return path.join(layout.workspacesDir, env);
}

export function ensureLayout(layout: SandboxLayout): void {
  for (const env of ENVIRONMENTS) {
    fs.mkdirSync(workspaceRoot(layout, env), { recursive: true });
  }
  fs.mkdirSync(layout.snapshotDir, { recursive: true });
  fs.mkdirSync(path.dirname(layout.logPath), { recursive: true });
  fs.mkdirSync(layout.lockDir, { recursive: true });
}
