/**
 * Sandboxed Executor
 *
 * Applies one plan action to a workspace root. Every path argument is
 * confined to the root before anything is touched. Failures of any kind
 * come back as `{ ok: false }`; nothing is thrown to the caller, so one
 * bad action never stops the rest of a batch.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { Action, ExecResult, FailureReason, Operation } from '../core/types.js';
import { isErrno, resolveEntryInside, resolveInside } from './confine.js';

const TRAVERSAL_BLOCKED = 'Path traversal blocked';

const ARITY = new Map<string, string[]>([
  ['write', ['path', 'content']],
  ['append', ['path', 'content']],
  ['delete_file', ['path']],
  ['move', ['src', 'dst']],
  ['make_dir', ['path']],
]);

class ActionFailure extends Error {
  readonly failure: FailureReason;

  constructor(failure: FailureReason, message: string) {
    super(message);
    this.name = 'ActionFailure';
    this.failure = failure;
  }
}

/**
 * Typed view of an action. Fails with `bad_arguments` when a known
 * kind is missing one of its arguments.
 */
export function toOperation(action: Action): Operation {
  const names = ARITY.get(action.kind);
  if (!names) {
    return { kind: 'unknown', name: action.kind };
  }
  if (action.args.length < names.length) {
    throw new ActionFailure(
      'bad_arguments',
      `Error: ${action.kind} expects ${names.length} argument(s) (${names.join(', ')}), got ${action.args.length}`,
    );
  }

  const [first, second] = action.args;
  switch (action.kind) {
    case 'write':
      return { kind: 'write', path: first, content: second };
    case 'append':
      return { kind: 'append', path: first, content: second };
    case 'delete_file':
      return { kind: 'delete_file', path: first };
    case 'make_dir':
      return { kind: 'make_dir', path: first };
    case 'move':
      return { kind: 'move', src: first, dst: second };
    default:
      return { kind: 'unknown', name: action.kind };
  }
}

export function executeAction(root: string, action: Action): ExecResult {
  try {
    return { ok: true, message: apply(root, toOperation(action)) };
  } catch (err) {
    if (err instanceof ActionFailure) {
      return { ok: false, message: err.message, failure: err.failure };
    }
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, message: `Error: ${message}`, failure: 'io' };
  }
}

/** Runs every action in order, whatever happened to the previous one. */
export function executeAll(root: string, actions: readonly Action[]): ExecResult[] {
  return actions.map((action) => executeAction(root, action));
}

function apply(root: string, op: Operation): string {
  switch (op.kind) {
    case 'write': {
      const target = confine(root, op.path);
      ensureParent(target);
      fs.writeFileSync(target, op.content, 'utf-8');
      return `Wrote ${op.path}`;
    }

    case 'append': {
      const target = confine(root, op.path);
      ensureParent(target);
      // Always newline-first, even when the file is new.
      fs.appendFileSync(target, '\n' + op.content, 'utf-8');
      return `Appended ${op.path}`;
    }

    case 'delete_file': {
      const target = confineEntry(root, op.path);
      const stat = lstatOrNull(target);
      if (stat?.isDirectory()) {
        throw new ActionFailure('is_directory', 'Refusing to delete directories');
      }
      if (!stat) {
        throw new ActionFailure('not_found', `Not found: ${op.path}`);
      }
      fs.unlinkSync(target);
      return `Deleted ${op.path}`;
    }

    case 'move': {
      const src = confineEntry(root, op.src);
      const dst = confineEntry(root, op.dst);
      if (!lstatOrNull(src)) {
        throw new ActionFailure('not_found', `Not found: ${op.src}`);
      }
      ensureParent(dst);
      moveEntry(src, dst);
      return `Moved ${op.src} -> ${op.dst}`;
    }

    case 'make_dir': {
      const target = confine(root, op.path);
      fs.mkdirSync(target, { recursive: true });
      return `Created dir ${op.path}`;
    }

    case 'unknown':
      throw new ActionFailure('not_allowed', `Action not allowed: ${op.name}`);

    default: {
      const unreachable: never = op;
      throw new Error(`Unhandled operation: ${JSON.stringify(unreachable)}`);
    }
  }
}

function confine(root: string, relPath: string): string {
  const target = resolveInside(root, relPath);
  if (target === null) {
    throw new ActionFailure('confinement', TRAVERSAL_BLOCKED);
  }
  return target;
}

/** Like `confine`, but a symlink at the leaf is the link itself. */
function confineEntry(root: string, relPath: string): string {
  const entry = resolveEntryInside(root, relPath);
  if (entry === null) {
    throw new ActionFailure('confinement', TRAVERSAL_BLOCKED);
  }
  return entry;
}

function ensureParent(target: string): void {
  fs.mkdirSync(path.dirname(target), { recursive: true });
}

function lstatOrNull(target: string): fs.Stats | null {
  try {
    return fs.lstatSync(target);
  } catch (err) {
    if (isErrno(err, 'ENOENT')) return null;
    throw err;
  }
}

/**
 * rename(2) semantics: an existing destination file is replaced, an
 * existing destination directory is an error. Across filesystems the
 * entry is copied and the source removed.
 */
function moveEntry(src: string, dst: string): void {
  try {
    fs.renameSync(src, dst);
  } catch (err) {
    if (!isErrno(err, 'EXDEV')) throw err;
    if (fs.lstatSync(dst, { throwIfNoEntry: false })?.isDirectory()) {
      throw new Error(`EISDIR: destination is a directory, rename '${src}' -> '${dst}'`);
    }
    fs.cpSync(src, dst, { recursive: true, force: true, verbatimSymlinks: true });
    fs.rmSync(src, { recursive: true, force: true });
  }
}
