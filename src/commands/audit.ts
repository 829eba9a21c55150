/**
 * plangate audit — inspect the audit log
 *
 * Commands:
 *   plangate audit last [--json]   Show the most recent batch record
 *   plangate audit verify          Recompute every line's checksum
 */

import { resolveLayout } from '../core/layout.js';
import { AuditLog } from '../audit/logger.js';

interface AuditOptions {
  json?: boolean;
}

export async function auditCommand(action: string, options: AuditOptions = {}): Promise<void> {
  const log = new AuditLog(resolveLayout().logPath);

  switch (action) {
    case 'last': {
      const record = log.lastRecord();
      if (!record) {
        console.log('  No audit records yet.');
        return;
      }

      if (options.json) {
        console.log(JSON.stringify(record, null, 2));
        return;
      }

      console.log('');
      console.log(`  Time:      ${record.ts}`);
      console.log(`  Env:       ${record.env}`);
      console.log(`  Task:      ${record.task}`);
      console.log(`  Risk:      ${record.risk}`);
      console.log(`  Approved:  ${record.approved ? 'yes' : 'no'} (${record.approver_note})`);
      console.log(`  Snapshot:  ${record.pre_snapshot}`);
      console.log('  Results:');
      for (const result of record.results) {
        console.log(`    [${result.ok ? '✅' : '❌'}] ${result.raw} → ${result.message}`);
      }
      console.log('');
      break;
    }

    case 'verify': {
      const result = log.verify();
      if (result.valid) {
        console.log(`  ✅ ${result.entryCount} entr${result.entryCount === 1 ? 'y' : 'ies'} verified`);
        return;
      }
      console.error(`  ❌ Audit log failed verification (${result.entryCount} entries):`);
      for (const error of result.errors) {
        console.error(`    - ${error}`);
      }
      process.exit(1);
    }

    default:
      console.error(`  ❌ Unknown audit command: ${action}`);
      process.exit(1);
  }
}
