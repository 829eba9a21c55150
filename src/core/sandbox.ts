/**
 * Sandbox — the execution interlock
 *
 *   1. Parse the plan and score it against the policy
 *   2. Refuse to run without approval when the score demands it
 *   3. Under the environment lock: snapshot, execute each action, audit
 *   4. Roll back to any earlier snapshot on request
 */

import type { Action, Analysis, AuditRecord, Environment } from './types.js';
import { isEnvironment } from './types.js';
import { parsePlan } from './parser.js';
import { type SandboxLayout, workspaceRoot } from './layout.js';
import { withEnvLock } from './lock.js';
import { evaluatePlan, requiresApproval, type SandboxPolicy } from '../policy/engine.js';
import { executeAction } from '../sandbox/executor.js';
import { SnapshotManager } from '../sandbox/snapshots.js';
import { AuditLog, type VerifyResult } from '../audit/logger.js';

export interface PlanAnalysis {
  actions: Action[];
  analysis: Analysis;
}

export interface BatchRequest {
  env: Environment;
  task: string;
  actions: Action[];
  analysis: Analysis;
  approved: boolean;
  approverNote: string;
}

export const AUTO_APPROVED_NOTE = 'Auto-approved (Low risk)';

export class Sandbox {
  readonly layout: SandboxLayout;
  readonly snapshots: SnapshotManager;
  readonly audit: AuditLog;
  private now: () => Date;

  constructor(layout: SandboxLayout, now: () => Date = () => new Date()) {
    this.layout = layout;
    this.now = now;
    this.snapshots = new SnapshotManager({
      snapshotDir: layout.snapshotDir,
      workspaceRoot: (env) => this.workspace(env),
      now,
    });
    this.audit = new AuditLog(layout.logPath);
  }

  workspace(env: string): string {
    if (!isEnvironment(env)) {
      throw new Error(`Unknown environment: ${env}`);
    }
    return workspaceRoot(this.layout, env);
  }

  analyze(planText: string, env: Environment, policy: SandboxPolicy): PlanAnalysis {
    const actions = parsePlan(planText);
    return { actions, analysis: evaluatePlan(actions, env, policy) };
  }

  runBatch(request: BatchRequest): AuditRecord {
    const { env, actions, analysis } = request;
    const needsApproval = requiresApproval(analysis, env);
    if (needsApproval && !request.approved) {
      throw new Error(`Approval required: ${analysis.risk} risk batch for ${env} was not approved`);
    }

    const root = this.workspace(env);
    return withEnvLock(env, { lockDir: this.layout.lockDir }, () => {
      const preSnapshot = this.snapshots.snapshot(env);
      console.log(`  [snapshot] ${env} -> ${preSnapshot}`);

      const results = actions.map((action) => {
        const result = executeAction(root, action);
        console.log(`  [run] ${result.ok ? 'ok' : 'FAILED'} ${action.raw} -> ${result.message}`);
        return { raw: action.raw, ok: result.ok, message: result.message };
      });

      const record: AuditRecord = {
        ts: this.now().toISOString(),
        env,
        task: request.task,
        risk: analysis.risk,
        reasons: analysis.reasons,
        approved: !needsApproval || request.approved,
        approver_note: needsApproval ? request.approverNote : AUTO_APPROVED_NOTE,
        pre_snapshot: preSnapshot,
        results,
      };
      this.audit.append(record);
      console.log(`  [audit] ${results.length} result(s) appended to ${this.audit.path}`);
      return record;
    });
  }

  rollback(env: Environment, snapshotPath: string): void {
    withEnvLock(env, { lockDir: this.layout.lockDir }, () => {
      this.snapshots.restore(env, snapshotPath);
    });
    console.log(`  [restore] ${env} <- ${snapshotPath}`);
  }

  lastAudit(): AuditRecord | null {
    return this.audit.lastRecord();
  }

  verifyAudit(): VerifyResult {
    return this.audit.verify();
  }
}
