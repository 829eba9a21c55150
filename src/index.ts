#!/usr/bin/env node

/**
 * plangate — policy-gated sandbox for agent-issued file actions
 *
 * An agent's plan is scored against a YAML policy, approved by a human
 * when the risk calls for it, and run inside a per-environment workspace
 * after a full snapshot. Every batch ends up in a checksummed audit log.
 *
 * Usage:
 *   plangate init
 *   plangate analyze [plan] --env dev [--report risk.md]
 *   plangate run [plan] --env dev --task "..." [--confirm APPROVE] [--note "..."]
 *   plangate snapshots [--env dev]
 *   plangate restore <env> [snapshot]
 *   plangate audit last [--json]
 *   plangate audit verify
 *   plangate policy apply <file>
 *   plangate policy show
 *   plangate seed <env>
 *   plangate status
 */

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { analyzeCommand } from './commands/analyze.js';
import { runCommand } from './commands/run.js';
import { restoreCommand, snapshotsCommand } from './commands/snapshots.js';
import { auditCommand } from './commands/audit.js';
import { policyCommand } from './commands/policy.js';
import { seedCommand } from './commands/seed.js';
import { statusCommand } from './commands/status.js';

const program = new Command();

program
  .name('plangate')
  .description('Policy-gated, snapshot-backed sandbox for agent file actions')
  .version('0.1.0');

// plangate init
program
  .command('init')
  .description('Create workspaces, snapshot and log directories, and a default policy')
  .action(initCommand);

// plangate analyze [plan]
program
  .command('analyze')
  .description('Score a plan against the policy without running it')
  .argument('[plan]', 'Plan file (reads stdin when omitted or "-")')
  .option('--env <env>', 'Target environment: dev, staging, prod', 'dev')
  .option('--report <file>', 'Write a Markdown risk report')
  .action(analyzeCommand);

// plangate run [plan]
program
  .command('run')
  .description('Analyze, approve, snapshot, execute and audit a plan')
  .argument('[plan]', 'Plan file (reads stdin when omitted or "-")')
  .option('--env <env>', 'Target environment: dev, staging, prod', 'dev')
  .option('--task <text>', 'What the agent is trying to do', '')
  .option('--confirm <text>', 'Approval text, skips the prompt (must be APPROVE)')
  .option('--note <text>', 'Approver reason, logged with the batch')
  .action((plan: string | undefined, options: { env: string; task: string; confirm?: string; note?: string }) =>
    runCommand(plan, options));

// plangate snapshots
program
  .command('snapshots')
  .description('List workspace snapshots, newest first')
  .option('--env <env>', 'Only snapshots for this environment')
  .action(snapshotsCommand);

// plangate restore <env> [snapshot]
program
  .command('restore')
  .description('Replace a workspace with a snapshot (latest when omitted)')
  .argument('<env>', 'Environment to restore')
  .argument('[snapshot]', 'Snapshot name or path')
  .action(restoreCommand);

// plangate audit
const audit = program
  .command('audit')
  .description('Inspect the audit log');

audit
  .command('last')
  .description('Show the most recent batch record')
  .option('--json', 'Print the raw record as JSON', false)
  .action((options: { json: boolean }) => auditCommand('last', options));

audit
  .command('verify')
  .description('Recompute the checksum of every record')
  .action(() => auditCommand('verify'));

// plangate policy
const policy = program
  .command('policy')
  .description('Manage the risk policy');

policy
  .command('apply <file>')
  .description('Validate a YAML policy file and make it active')
  .action((file: string) => policyCommand('apply', file));

policy
  .command('show')
  .description('Show the effective policy')
  .action(() => policyCommand('show'));

// plangate seed <env>
program
  .command('seed <env>')
  .description('Create demo files in a workspace')
  .action(seedCommand);

// plangate status
program
  .command('status')
  .description('Show plangate status')
  .action(statusCommand);

program.parse();
