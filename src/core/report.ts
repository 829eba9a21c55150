/**
 * Markdown risk report for a plan, for export alongside the audit record.
 */

import type { Action, Analysis } from './types.js';

export function renderRiskReport(analysis: Analysis, actions: readonly Action[], env: string, now: Date = new Date()): string {
  const generated = now.toISOString().replace('T', ' ').replace(/\.\d{3}Z$/, '');
  const lines = [
    '# Risk Analysis Report',
    '',
    `**Environment:** ${env}`,
    `**Overall Risk Level:** ${analysis.risk}`,
    `**Generated:** ${generated} UTC`,
    '',
    '## Risk Assessment',
    '',
  ];

  if (analysis.reasons.length > 0) {
    lines.push('**Risk Factors:**');
    for (const reason of analysis.reasons) {
      lines.push(`- ${reason}`);
    }
  } else {
    lines.push('No specific risk factors identified.');
  }

  lines.push('', `## Planned Actions (${actions.length} total)`, '');
  actions.forEach((action, i) => {
    lines.push(`${i + 1}. \`${action.raw}\``);
  });

  return lines.join('\n') + '\n';
}
