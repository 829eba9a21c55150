import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { formatAuditStatus } from '../commands/status.js';

describe('formatAuditStatus', () => {
  it('reports a clean log', () => {
    assert.strictEqual(
      formatAuditStatus({ valid: true, entryCount: 3, errors: [] }),
      '✅ 3 record(s), checksums OK',
    );
  });

  it('flags a log that failed verification', () => {
    assert.strictEqual(
      formatAuditStatus({ valid: false, entryCount: 3, errors: ['Checksum mismatch at line 2'] }),
      '❌ 3 record(s), 1 problem(s). Run: plangate audit verify',
    );
  });
});
