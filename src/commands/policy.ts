/**
 * plangate policy — Manage the risk policy
 *
 * Commands:
 *   plangate policy apply <file>   Validate a YAML policy and make it active
 *   plangate policy show           Display the effective policy
 */

import fs from 'node:fs';
import path from 'node:path';
import { parse as yamlParse, stringify as yamlStringify } from 'yaml';
import { resolveLayout } from '../core/layout.js';
import { errorMessage } from '../cli/utils.js';
import { PolicyParser, PolicySource } from '../policy/parser.js';

export async function policyCommand(action: string, file?: string): Promise<void> {
  const layout = resolveLayout();

  switch (action) {
    case 'apply': {
      if (!file) {
        console.error('  ❌ Usage: plangate policy apply <file>');
        process.exit(1);
      }

      const resolvedPath = path.resolve(file);
      if (!fs.existsSync(resolvedPath)) {
        console.error(`  ❌ File not found: ${resolvedPath}`);
        process.exit(1);
      }

      try {
        const content = fs.readFileSync(resolvedPath, 'utf-8');
        const errors = PolicyParser.validate(yamlParse(content));

        if (errors.length > 0) {
          console.error('  ❌ Policy validation errors:');
          for (const error of errors) {
            console.error(`    - ${error}`);
          }
          process.exit(1);
        }

        fs.mkdirSync(layout.home, { recursive: true });
        fs.writeFileSync(layout.policyPath, content, 'utf-8');

        const policy = new PolicySource(layout.policyPath).current;
        console.log(`  ✅ Policy applied from ${resolvedPath}`);
        console.log(`  Prod locked:      ${policy.prod_locked}`);
        console.log(`  Allowed actions:  ${policy.allowed_actions.join(', ')}`);
        console.log(`  High-risk words:  ${policy.high_risk_keywords.length}`);
        console.log(`  Medium hints:     ${policy.med_risk_hints.length}`);
      } catch (err) {
        console.error(`  ❌ Failed to parse policy: ${errorMessage(err)}`);
        process.exit(1);
      }
      break;
    }

    case 'show': {
      const source = new PolicySource(layout.policyPath);
      console.log('');
      console.log('  Current policy');
      console.log('  ──────────────');
      console.log(`  Source: ${fs.existsSync(source.path) ? source.path : 'built-in defaults'}`);
      console.log('');
      console.log(yamlStringify(source.current).split('\n').map(l => '  ' + l).join('\n'));
      break;
    }

    default:
      console.error(`  ❌ Unknown policy command: ${action}`);
      process.exit(1);
  }
}
