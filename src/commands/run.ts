/**
 * plangate run [plan] — analyze, approve, snapshot, execute, audit
 *
 * Low-risk batches outside prod run straight away. Anything else needs
 * the operator to type APPROVE, either at the prompt or via --confirm.
 * Failed actions do not stop the batch; they are reported and logged,
 * and the pre-execution snapshot can be restored with `plangate restore`.
 */

import { ensureLayout, resolveLayout } from '../core/layout.js';
import { Sandbox } from '../core/sandbox.js';
import { TerminalApprover, type Approver } from '../channels/terminal.js';
import { STDIN_APPROVAL_HINT, errorMessage, parseEnvironment, planFromStdin, readPlanText } from '../cli/utils.js';
import { loadPolicy } from '../policy/parser.js';
import { isApproved, requiresApproval } from '../policy/engine.js';
import { printAnalysis } from './analyze.js';

interface RunOptions {
  env: string;
  task: string;
  confirm?: string;
  note?: string;
}

export async function runCommand(
  file: string | undefined,
  options: RunOptions,
  approver: Approver = new TerminalApprover(),
): Promise<void> {
  try {
    const env = parseEnvironment(options.env);
    const layout = resolveLayout();
    ensureLayout(layout);

    const sandbox = new Sandbox(layout);
    const { actions, analysis } = sandbox.analyze(readPlanText(file), env, loadPolicy(layout.policyPath));
    printAnalysis(analysis, actions, env);

    let approved = true;
    let approverNote = options.note ?? '';
    if (requiresApproval(analysis, env)) {
      if (options.confirm !== undefined) {
        approved = isApproved(options.confirm);
      } else if (planFromStdin(file) && approver instanceof TerminalApprover) {
        throw new Error(STDIN_APPROVAL_HINT);
      } else {
        const decision = await approver.requestApproval({
          env,
          task: options.task,
          analysis,
          actionCount: actions.length,
        });
        approved = decision.approved;
        approverNote = options.note ?? decision.note;
      }
    }

    if (!approved) {
      console.error('  ❌ Not approved. Nothing was executed.');
      process.exit(1);
    }

    const record = sandbox.runBatch({ env, task: options.task, actions, analysis, approved, approverNote });

    console.log('');
    for (const result of record.results) {
      console.log(`  [${result.ok ? '✅' : '❌'}] ${result.raw} → ${result.message}`);
    }
    console.log('');

    if (record.results.every((result) => result.ok)) {
      console.log('  ✅ Plan executed in sandbox.');
    } else {
      console.log('  ⚠️  Some actions failed. Roll back with:');
      console.log(`    plangate restore ${env} ${record.pre_snapshot}`);
      process.exitCode = 1;
    }
  } catch (err) {
    console.error(`  ❌ ${errorMessage(err)}`);
    process.exit(1);
  }
}
