/**
 * plangate seed <env> — drop demo files into a workspace
 */

import { ensureLayout, resolveLayout, workspaceRoot } from '../core/layout.js';
import { seedDemoFiles } from '../core/seed.js';
import { errorMessage, parseEnvironment } from '../cli/utils.js';

export async function seedCommand(envArg: string): Promise<void> {
  try {
    const env = parseEnvironment(envArg);
    const layout = resolveLayout();
    ensureLayout(layout);

    const created = seedDemoFiles(workspaceRoot(layout, env));
    if (created.length === 0) {
      console.log(`  Demo files already present in ${env}.`);
      return;
    }
    for (const rel of created) {
      console.log(`  ✅ ${env}: ${rel}`);
    }
  } catch (err) {
    console.error(`  ❌ ${errorMessage(err)}`);
    process.exit(1);
  }
}
