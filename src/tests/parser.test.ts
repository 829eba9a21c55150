import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parsePlan } from '../core/parser.js';

describe('parsePlan', () => {
  it('splits a payload off at the first pipe', () => {
    assert.deepStrictEqual(parsePlan('write a/b.txt | hello world'), [
      { kind: 'write', args: ['a/b.txt', 'hello world'], raw: 'write a/b.txt | hello world' },
    ]);
  });

  it('splits plain lines on whitespace', () => {
    assert.deepStrictEqual(parsePlan('move   tmp/output.txt\treports/output.txt'), [
      { kind: 'move', args: ['tmp/output.txt', 'reports/output.txt'], raw: 'move   tmp/output.txt\treports/output.txt' },
    ]);
  });

  it('skips blank lines and comments', () => {
    const plan = [
      '',
      '   ',
      '# a comment',
      '    # indented comment',
      'make_dir releases/2025',
      '',
    ].join('\n');
    const actions = parsePlan(plan);
    assert.strictEqual(actions.length, 1);
    assert.strictEqual(actions[0].kind, 'make_dir');
    assert.deepStrictEqual(actions[0].args, ['releases/2025']);
  });

  it('keeps the trimmed line as raw', () => {
    const [action] = parsePlan('   delete_file old/legacy.sql   ');
    assert.strictEqual(action.raw, 'delete_file old/legacy.sql');
  });

  it('keeps later pipes inside the payload', () => {
    const [action] = parsePlan('append log.txt | a | b');
    assert.deepStrictEqual(action.args, ['log.txt', 'a | b']);
  });

  it('allows an empty payload', () => {
    const [action] = parsePlan('write empty.txt |');
    assert.deepStrictEqual(action.args, ['empty.txt', '']);
  });

  it('keeps unknown kinds verbatim', () => {
    const [action] = parsePlan('rm -rf /');
    assert.strictEqual(action.kind, 'rm');
    assert.deepStrictEqual(action.args, ['-rf', '/']);
  });

  it('tolerates a line with no kind before the pipe', () => {
    const [action] = parsePlan('| just a payload');
    assert.strictEqual(action.kind, '');
    assert.deepStrictEqual(action.args, ['just a payload']);
  });

  it('does not count arguments', () => {
    const [action] = parsePlan('write');
    assert.deepStrictEqual(action, { kind: 'write', args: [], raw: 'write' });
  });

  it('handles CRLF line endings', () => {
    const actions = parsePlan('make_dir a\r\nmake_dir b\r\n');
    assert.deepStrictEqual(actions.map((a) => a.raw), ['make_dir a', 'make_dir b']);
  });
});
