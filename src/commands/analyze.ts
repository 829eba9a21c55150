/**
 * plangate analyze [plan] — score a plan without running it
 */

import fs from 'node:fs';
import path from 'node:path';
import { ensureLayout, resolveLayout } from '../core/layout.js';
import { renderRiskReport } from '../core/report.js';
import { Sandbox } from '../core/sandbox.js';
import type { Action, Analysis } from '../core/types.js';
import { RISK_LABELS } from '../channels/terminal.js';
import { errorMessage, parseEnvironment, readPlanText } from '../cli/utils.js';
import { loadPolicy } from '../policy/parser.js';
import { requiresApproval } from '../policy/engine.js';

interface AnalyzeOptions {
  env: string;
  report?: string;
}

export function printAnalysis(analysis: Analysis, actions: readonly Action[], env: string): void {
  console.log('');
  console.log(`  Plan:     ${actions.length} action(s) for ${env}`);
  console.log(`  Risk:     ${RISK_LABELS[analysis.risk] || analysis.risk}`);
  if (analysis.reasons.length > 0) {
    console.log('  Reasons:');
    for (const reason of analysis.reasons) {
      console.log(`    - ${reason}`);
    }
  }
  console.log(`  Approval: ${requiresApproval(analysis, env) ? 'required' : 'not required'}`);
  console.log('');
}

export async function analyzeCommand(file: string | undefined, options: AnalyzeOptions): Promise<void> {
  try {
    const env = parseEnvironment(options.env);
    const layout = resolveLayout();
    ensureLayout(layout);

    const sandbox = new Sandbox(layout);
    const { actions, analysis } = sandbox.analyze(readPlanText(file), env, loadPolicy(layout.policyPath));
    printAnalysis(analysis, actions, env);

    if (options.report) {
      const reportPath = path.resolve(options.report);
      fs.writeFileSync(reportPath, renderRiskReport(analysis, actions, env), 'utf-8');
      console.log(`  ✅ Risk report written to ${reportPath}`);
    }
  } catch (err) {
    console.error(`  ❌ ${errorMessage(err)}`);
    process.exit(1);
  }
}
