/**
 * Plan Parser
 *
 * One action per line:
 *   write releases/notes.md | Release notes
 *   make_dir releases/2025
 *   move tmp/output.txt reports/output.txt
 *
 * Text after the first `|` is a single trailing payload argument.
 * Blank lines and `#` comments are skipped. Argument counts are not
 * checked here; the executor reports them.
 */

import type { Action } from './types.js';

export function parsePlan(text: string): Action[] {
  const actions: Action[] = [];

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;

    const pipe = line.indexOf('|');
    if (pipe >= 0) {
      const [kind = '', ...args] = splitWords(line.slice(0, pipe));
      args.push(line.slice(pipe + 1).trim());
      actions.push({ kind, args, raw: line });
    } else {
      const [kind = '', ...args] = splitWords(line);
      actions.push({ kind, args, raw: line });
    }
  }

  return actions;
}

function splitWords(text: string): string[] {
  return text.trim().split(/\s+/).filter(Boolean);
}
