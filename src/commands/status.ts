/**
 * plangate status — Show layout, policy, snapshots and audit state
 */

import fs from 'node:fs';
import { resolveLayout, workspaceRoot } from '../core/layout.js';
import { ENVIRONMENTS } from '../core/types.js';
import { AuditLog, type VerifyResult } from '../audit/logger.js';
import { Sandbox } from '../core/sandbox.js';

export async function statusCommand(): Promise<void> {
  const layout = resolveLayout();

  console.log('');
  console.log('  🛡️  plangate status');
  console.log('  ──────────────────');

  if (!fs.existsSync(layout.home)) {
    console.log('  ❌ Not initialized. Run: plangate init');
    return;
  }

  console.log(`  Home:     ${layout.home}`);
  console.log(`  Policy:   ${fs.existsSync(layout.policyPath) ? '✅ ' + layout.policyPath : '⚠️  Missing (using defaults)'}`);

  const { snapshots } = new Sandbox(layout);
  for (const env of ENVIRONMENTS) {
    const root = workspaceRoot(layout, env);
    const state = fs.existsSync(root) ? '✅' : '❌';
    console.log(`  ${env.padEnd(8)}  ${state} ${root} (${snapshots.list(env).length} snapshot(s))`);
  }

  const audit = new AuditLog(layout.logPath);
  const verification = audit.verify();
  if (verification.entryCount === 0) {
    console.log('  Audit:    No records yet');
  } else {
    console.log(`  Audit:    ${formatAuditStatus(verification)}`);
  }

  console.log('');
}

export function formatAuditStatus(verification: VerifyResult): string {
  if (verification.valid) {
    return `✅ ${verification.entryCount} record(s), checksums OK`;
  }
  return `❌ ${verification.entryCount} record(s), ${verification.errors.length} problem(s). Run: plangate audit verify`;
}
