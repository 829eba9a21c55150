/**
 * Policy Engine
 *
 * Scores a whole batch of plan actions for one environment.
 *
 * Any High signal anywhere in the batch makes the batch High; otherwise
 * any Medium signal makes it Medium; otherwise it is Low. Reasons are
 * returned in the order they were found, duplicates included.
 *
 * Evaluation is a pure function of (actions, environment, policy).
 */

import type { Action, Analysis, RiskLevel } from '../core/types.js';

export interface SandboxPolicy {
  prod_locked: boolean;
  allowed_actions: string[];
  high_risk_keywords: string[];
  med_risk_hints: string[];
}

export const APPROVAL_PHRASE = 'APPROVE';

export function evaluatePlan(actions: readonly Action[], env: string, policy: SandboxPolicy): Analysis {
  const reasons: string[] = [];
  let high = false;
  let medium = false;

  if (env === 'prod' && policy.prod_locked) {
    high = true;
    reasons.push('Prod environment is locked by policy.');
  }

  for (const action of actions) {
    const rawLower = action.raw.toLowerCase();

    if (!policy.allowed_actions.includes(action.kind)) {
      high = true;
      reasons.push(`Disallowed action: ${action.kind}`);
    }

    for (const keyword of policy.high_risk_keywords) {
      if (rawLower.includes(keyword.toLowerCase())) {
        high = true;
        reasons.push(`High-risk keyword detected: '${keyword}' in '${action.raw}'`);
      }
    }

    for (const hint of policy.med_risk_hints) {
      if (rawLower.includes(hint.toLowerCase())) {
        medium = true;
        reasons.push(`Medium-risk hint: '${hint}' in '${action.raw}'`);
      }
    }

    if (env === 'prod' && action.kind === 'delete_file') {
      high = true;
      reasons.push('Deleting files in prod requires explicit approval.');
    }
  }

  let risk: RiskLevel = 'Low';
  if (high) risk = 'High';
  else if (medium) risk = 'Medium';

  return { risk, reasons };
}

/** Anything above Low, and anything at all in prod, needs a human. */
export function requiresApproval(analysis: Analysis, env: string): boolean {
  return analysis.risk !== 'Low' || env === 'prod';
}

export function isApproved(confirmation: string): boolean {
  return confirmation.trim() === APPROVAL_PHRASE;
}
