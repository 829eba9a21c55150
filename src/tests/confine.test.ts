import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { canonicalize, isWithin, resolveEntryInside, resolveInside } from '../sandbox/confine.js';

describe('resolveInside', () => {
  let tmpDir: string;
  let root: string;
  let outside: string;

  beforeEach(() => {
    tmpDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'plangate-confine-test-')));
    root = path.join(tmpDir, 'ws');
    outside = path.join(tmpDir, 'outside');
    fs.mkdirSync(root);
    fs.mkdirSync(outside);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('resolves relative paths under the root', () => {
    assert.strictEqual(resolveInside(root, 'a/b.txt'), path.join(root, 'a', 'b.txt'));
  });

  it('allows .. that stays inside', () => {
    assert.strictEqual(resolveInside(root, 'a/../b.txt'), path.join(root, 'b.txt'));
  });

  it('allows the root itself', () => {
    assert.strictEqual(resolveInside(root, '.'), root);
  });

  it('blocks .. escapes', () => {
    assert.strictEqual(resolveInside(root, '../../etc/passwd'), null);
  });

  it('blocks absolute paths outside the root', () => {
    assert.strictEqual(resolveInside(root, '/etc/passwd'), null);
  });

  it('blocks a sibling that shares the root as a name prefix', () => {
    fs.mkdirSync(`${root}-evil`);
    assert.strictEqual(resolveInside(root, '../ws-evil/x.txt'), null);
  });

  it('blocks symlinked directories that point outside', () => {
    fs.symlinkSync(outside, path.join(root, 'link'));
    assert.strictEqual(resolveInside(root, 'link/file.txt'), null);
  });

  it('blocks dangling symlinks that point outside', () => {
    fs.symlinkSync(path.join(outside, 'not-yet.txt'), path.join(root, 'dangling'));
    assert.strictEqual(resolveInside(root, 'dangling'), null);
  });

  it('follows symlinks that stay inside', () => {
    fs.mkdirSync(path.join(root, 'real'));
    fs.symlinkSync(path.join(root, 'real'), path.join(root, 'alias'));
    assert.strictEqual(resolveInside(root, 'alias/x.txt'), path.join(root, 'real', 'x.txt'));
  });

  it('resolveEntryInside names the link, resolveInside its target', () => {
    fs.mkdirSync(path.join(root, 'real'));
    fs.symlinkSync('real', path.join(root, 'alias'));
    assert.strictEqual(resolveEntryInside(root, 'alias'), path.join(root, 'alias'));
    assert.strictEqual(resolveInside(root, 'alias'), path.join(root, 'real'));
    assert.strictEqual(resolveEntryInside(root, 'alias/x.txt'), path.join(root, 'real', 'x.txt'));
  });

  it('resolveEntryInside still blocks links that point outside', () => {
    fs.symlinkSync(outside, path.join(root, 'link'));
    assert.strictEqual(resolveEntryInside(root, 'link'), null);
    assert.strictEqual(resolveEntryInside(root, '../outside'), null);
  });

  it('canonicalizes a root reached through a symlink', () => {
    const rootLink = path.join(tmpDir, 'ws-link');
    fs.symlinkSync(root, rootLink);
    assert.strictEqual(resolveInside(rootLink, 'x.txt'), path.join(root, 'x.txt'));
    assert.strictEqual(canonicalize(rootLink), root);
  });
});

describe('isWithin', () => {
  it('compares whole path segments', () => {
    assert.strictEqual(isWithin('/srv/ws', '/srv/ws'), true);
    assert.strictEqual(isWithin('/srv/ws', '/srv/ws/a'), true);
    assert.strictEqual(isWithin('/srv/ws', '/srv/ws2/a'), false);
    assert.strictEqual(isWithin('/srv/ws', '/srv'), false);
  });
});
