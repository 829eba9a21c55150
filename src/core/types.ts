/**
 * Core Types — Action, Operation, Analysis, AuditRecord
 *
 * An Action is one line of an agent plan, kept as written.
 * An Operation is the executor's typed view of an Action.
 * An Analysis is the policy's verdict on a whole batch.
 * An AuditRecord is what gets written once a batch has run.
 */

export const ENVIRONMENTS = ['dev', 'staging', 'prod'] as const;

export type Environment = typeof ENVIRONMENTS[number];

export function isEnvironment(value: string): value is Environment {
  return (ENVIRONMENTS as readonly string[]).includes(value);
}

export const ACTION_KINDS = ['write', 'append', 'delete_file', 'move', 'make_dir'] as const;

export type ActionKind = typeof ACTION_KINDS[number];

export interface Action {
  /** Kept verbatim, including kinds the executor does not know. */
  kind: string;
  args: string[];
  raw: string;
}

export type Operation =
  | { kind: 'write'; path: string; content: string }
  | { kind: 'append'; path: string; content: string }
  | { kind: 'delete_file'; path: string }
  | { kind: 'move'; src: string; dst: string }
  | { kind: 'make_dir'; path: string }
  | { kind: 'unknown'; name: string };

export type FailureReason =
  | 'confinement'
  | 'not_allowed'
  | 'bad_arguments'
  | 'not_found'
  | 'is_directory'
  | 'io';

export type ExecResult =
  | { ok: true; message: string }
  | { ok: false; message: string; failure: FailureReason };

export type RiskLevel = 'Low' | 'Medium' | 'High';

export interface Analysis {
  risk: RiskLevel;
  reasons: string[];
}

export interface ActionOutcome {
  raw: string;
  ok: boolean;
  message: string;
}

export interface AuditRecord {
  ts: string;
  env: string;
  task: string;
  risk: RiskLevel;
  reasons: string[];
  approved: boolean;
  approver_note: string;
  pre_snapshot: string;
  results: ActionOutcome[];
}
