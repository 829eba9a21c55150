/**
 * Terminal Approval Channel
 *
 * Shows the risk analysis for a batch and waits for the operator to type
 * APPROVE and give a reason. Anything else is a refusal.
 */

import readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { Analysis } from '../core/types.js';
import { APPROVAL_PHRASE, isApproved } from '../policy/engine.js';

export interface ApprovalRequest {
  env: string;
  task: string;
  analysis: Analysis;
  actionCount: number;
}

export interface ApprovalDecision {
  approved: boolean;
  note: string;
}

export interface Approver {
  requestApproval(request: ApprovalRequest): Promise<ApprovalDecision>;
}

export const RISK_LABELS: Record<string, string> = {
  Low: '🟢 LOW',
  Medium: '🟡 MEDIUM',
  High: '🔴 HIGH',
};

export class TerminalApprover implements Approver {
  private input: Readable;
  private output: Writable;

  constructor(input: Readable = process.stdin, output: Writable = process.stdout) {
    this.input = input;
    this.output = output;
  }

  async requestApproval(request: ApprovalRequest): Promise<ApprovalDecision> {
    this.write('');
    this.write('  ════════════════════════════════════════════════════');
    this.write('    🔐 APPROVAL REQUIRED');
    this.write('  ════════════════════════════════════════════════════');
    this.write(`    Environment: ${request.env}`);
    this.write(`    Task:        ${request.task || '(none)'}`);
    this.write(`    Risk:        ${RISK_LABELS[request.analysis.risk] || request.analysis.risk}`);
    this.write(`    Actions:     ${request.actionCount}`);
    this.write('  ════════════════════════════════════════════════════');
    this.write('');

    const rl = readline.createInterface({ input: this.input, terminal: false });
    const lines = rl[Symbol.asyncIterator]();
    const prompt = async (question: string): Promise<string> => {
      this.output.write(question);
      const next = await lines.next();
      return next.done ? '' : next.value;
    };

    try {
      const confirmation = await prompt(`  Type '${APPROVAL_PHRASE}' to continue: `);
      if (!isApproved(confirmation)) {
        this.write('  ❌ Not approved');
        return { approved: false, note: confirmation.trim() };
      }

      const note = await prompt('  Reason / intent (will be logged): ');
      this.write('  ✅ Approved');
      return { approved: true, note: note.trim() };
    } finally {
      rl.close();
    }
  }

  private write(line: string): void {
    this.output.write(line + '\n');
  }
}
