import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Sandbox, AUTO_APPROVED_NOTE } from '../core/sandbox.js';
import { ensureLayout, resolveLayout, workspaceRoot, type SandboxLayout } from '../core/layout.js';
import { getEnvLockPath } from '../core/lock.js';
import { getDefaultPolicy } from '../policy/defaults.js';
import { checksumOf } from '../audit/logger.js';

const PLAN = [
  '# release prep',
  'write releases/notes.md | Release v1.2 notes',
  'append README.md | Added release instructions',
  'make_dir releases/2025-08-29',
  'move tmp/output.txt reports/output.txt',
  'delete_file old/legacy.sql',
].join('\n');

describe('Sandbox', () => {
  let tmpDir: string;
  let layout: SandboxLayout;
  let sandbox: Sandbox;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'plangate-sandbox-test-'));
    layout = resolveLayout(tmpDir);
    ensureLayout(layout);
    sandbox = new Sandbox(layout, () => new Date('2025-08-29T12:00:00.000Z'));

    const dev = workspaceRoot(layout, 'dev');
    fs.mkdirSync(path.join(dev, 'tmp'));
    fs.writeFileSync(path.join(dev, 'tmp', 'output.txt'), 'hello');
    fs.mkdirSync(path.join(dev, 'old'));
    fs.writeFileSync(path.join(dev, 'old', 'legacy.sql'), '');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('lays out one workspace per environment', () => {
    for (const env of ['dev', 'staging', 'prod']) {
      assert.strictEqual(fs.statSync(path.join(tmpDir, 'workspaces', env)).isDirectory(), true);
    }
    assert.strictEqual(layout.logPath, path.join(tmpDir, 'logs', 'actions.jsonl'));
  });

  it('analyzes a plan against the policy', () => {
    const { actions, analysis } = sandbox.analyze(PLAN, 'dev', getDefaultPolicy());
    assert.strictEqual(actions.length, 5);
    assert.deepStrictEqual(analysis, { risk: 'Low', reasons: [] });
  });

  it('runs a low-risk batch, snapshots first and audits it', () => {
    const { actions, analysis } = sandbox.analyze(PLAN, 'dev', getDefaultPolicy());
    const record = sandbox.runBatch({ env: 'dev', task: 'Prepare release', actions, analysis, approved: false, approverNote: '' });

    const snapshot = path.join(layout.snapshotDir, 'dev-20250829T120000Z');
    assert.deepStrictEqual(record, {
      ts: '2025-08-29T12:00:00.000Z',
      env: 'dev',
      task: 'Prepare release',
      risk: 'Low',
      reasons: [],
      approved: true,
      approver_note: AUTO_APPROVED_NOTE,
      pre_snapshot: snapshot,
      results: [
        { raw: 'write releases/notes.md | Release v1.2 notes', ok: true, message: 'Wrote releases/notes.md' },
        { raw: 'append README.md | Added release instructions', ok: true, message: 'Appended README.md' },
        { raw: 'make_dir releases/2025-08-29', ok: true, message: 'Created dir releases/2025-08-29' },
        { raw: 'move tmp/output.txt reports/output.txt', ok: true, message: 'Moved tmp/output.txt -> reports/output.txt' },
        { raw: 'delete_file old/legacy.sql', ok: true, message: 'Deleted old/legacy.sql' },
      ],
    });

    // The snapshot holds the pre-execution state.
    assert.strictEqual(fs.readFileSync(path.join(snapshot, 'tmp', 'output.txt'), 'utf-8'), 'hello');
    assert.strictEqual(fs.existsSync(path.join(snapshot, 'releases')), false);

    const dev = workspaceRoot(layout, 'dev');
    assert.strictEqual(fs.readFileSync(path.join(dev, 'README.md'), 'utf-8'), '\nAdded release instructions');

    assert.deepStrictEqual(sandbox.lastAudit(), record);
    const [line] = fs.readFileSync(layout.logPath, 'utf-8').split('\n');
    assert.strictEqual(JSON.parse(line).checksum, checksumOf(record));
    assert.strictEqual(fs.existsSync(getEnvLockPath('dev', layout.lockDir)), false);
  });

  it('refuses to run an unapproved batch that needs approval', () => {
    const { actions, analysis } = sandbox.analyze('make_dir a', 'prod', getDefaultPolicy());
    assert.throws(
      () => sandbox.runBatch({ env: 'prod', task: '', actions, analysis, approved: false, approverNote: '' }),
      /Approval required: High risk batch for prod was not approved/,
    );
    assert.deepStrictEqual(sandbox.snapshots.list(), []);
    assert.strictEqual(sandbox.lastAudit(), null);
  });

  it('records the approver note for approved batches', () => {
    const { actions, analysis } = sandbox.analyze('write notes.md | migrate schema', 'staging', getDefaultPolicy());
    const record = sandbox.runBatch({ env: 'staging', task: 't', actions, analysis, approved: true, approverNote: 'reviewed' });
    assert.strictEqual(record.risk, 'Medium');
    assert.strictEqual(record.approved, true);
    assert.strictEqual(record.approver_note, 'reviewed');
  });

  it('keeps going after failures and logs them', () => {
    const plan = 'write ../../etc/passwd | x\ndelete_file missing.txt\nwrite ok.txt | fine';
    const { actions, analysis } = sandbox.analyze(plan, 'dev', getDefaultPolicy());
    const record = sandbox.runBatch({ env: 'dev', task: 't', actions, analysis, approved: false, approverNote: '' });

    assert.deepStrictEqual(record.results, [
      { raw: 'write ../../etc/passwd | x', ok: false, message: 'Path traversal blocked' },
      { raw: 'delete_file missing.txt', ok: false, message: 'Not found: missing.txt' },
      { raw: 'write ok.txt | fine', ok: true, message: 'Wrote ok.txt' },
    ]);
    assert.deepStrictEqual(sandbox.lastAudit()?.results, record.results);
  });

  it('rolls back to the pre-execution snapshot', () => {
    const dev = workspaceRoot(layout, 'dev');
    const { actions, analysis } = sandbox.analyze(PLAN, 'dev', getDefaultPolicy());
    const record = sandbox.runBatch({ env: 'dev', task: 't', actions, analysis, approved: false, approverNote: '' });

    sandbox.rollback('dev', record.pre_snapshot);

    assert.strictEqual(fs.readFileSync(path.join(dev, 'tmp', 'output.txt'), 'utf-8'), 'hello');
    assert.strictEqual(fs.readFileSync(path.join(dev, 'old', 'legacy.sql'), 'utf-8'), '');
    assert.strictEqual(fs.existsSync(path.join(dev, 'releases')), false);
    assert.strictEqual(fs.existsSync(path.join(dev, 'README.md')), false);
  });

  it('refuses to run while another process holds the environment', () => {
    fs.writeFileSync(getEnvLockPath('dev', layout.lockDir), `${process.pid}\n`);
    const { actions, analysis } = sandbox.analyze('make_dir a', 'dev', getDefaultPolicy());

    assert.throws(
      () => sandbox.runBatch({ env: 'dev', task: 't', actions, analysis, approved: false, approverNote: '' }),
      /Environment dev is busy/,
    );
    assert.deepStrictEqual(sandbox.snapshots.list(), []);
  });

  it('rejects unknown environments', () => {
    assert.throws(() => sandbox.workspace('qa'), /Unknown environment: qa/);
  });
});
