import fs from 'node:fs';
import path from 'node:path';
import { ENVIRONMENTS, isEnvironment, type Environment } from '../core/types.js';

export function parseEnvironment(value: string): Environment {
  if (!isEnvironment(value)) {
    throw new Error(`Invalid --env: "${value}". Expected one of: ${ENVIRONMENTS.join(', ')}.`);
  }
  return value;
}

export const STDIN_APPROVAL_HINT =
  'Plan was read from stdin, so there is no terminal left to approve on. Pass --confirm APPROVE, or give the plan as a file.';

export function planFromStdin(file: string | undefined): boolean {
  return !file || file === '-';
}

/** Plan text from a file, or from stdin when the argument is `-` or missing. */
export function readPlanText(file: string | undefined, readStdin: () => string = () => fs.readFileSync(0, 'utf-8')): string {
  if (!file || file === '-') {
    return readStdin();
  }
  return fs.readFileSync(path.resolve(file), 'utf-8');
}

/** Resolve a snapshot given by name or by path inside the snapshot directory. */
export function resolveSnapshotArg(snapshotDir: string, value: string): string {
  const candidate = path.isAbsolute(value) ? value : path.join(snapshotDir, value);
  const relative = path.relative(path.resolve(snapshotDir), path.resolve(candidate));
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`Snapshot must be inside ${snapshotDir}: ${value}`);
  }
  return path.resolve(candidate);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
