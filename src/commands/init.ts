/**
 * plangate init — create the home layout and a default policy
 *
 * Creates ~/.plangate/ (or $PLANGATE_HOME) with one workspace per
 * environment, the snapshot and log directories, and policy.yml.
 */

import fs from 'node:fs';
import { stringify as yamlStringify } from 'yaml';
import { ensureLayout, resolveLayout } from '../core/layout.js';
import { getDefaultPolicy } from '../policy/defaults.js';

export async function initCommand(): Promise<void> {
  const layout = resolveLayout();

  console.log('');
  console.log('  🛡️  plangate — policy-gated agent sandbox');
  console.log('  ─────────────────────────────────────────');
  console.log('');

  ensureLayout(layout);
  console.log(`  ✅ Workspaces ready under ${layout.workspacesDir}`);
  console.log(`  ✅ Snapshots stored in ${layout.snapshotDir}`);
  console.log(`  ✅ Audit log at ${layout.logPath}`);

  if (fs.existsSync(layout.policyPath)) {
    console.log(`  Policy already present at ${layout.policyPath}`);
  } else {
    fs.writeFileSync(layout.policyPath, yamlStringify(getDefaultPolicy()), 'utf-8');
    console.log(`  ✅ Default policy saved to ${layout.policyPath}`);
  }

  console.log('');
  console.log('  Try:');
  console.log('');
  console.log('    plangate seed dev');
  console.log('    plangate analyze plan.txt --env dev');
  console.log('    plangate run plan.txt --env dev --task "Prepare release folder"');
  console.log('');
}
