/**
 * Default Policy
 *
 * Used for new installations and for any key the policy file leaves out.
 */

import { ACTION_KINDS } from '../core/types.js';
import type { SandboxPolicy } from './engine.js';

export function getDefaultPolicy(): SandboxPolicy {
  return {
    prod_locked: true,
    allowed_actions: [...ACTION_KINDS],
    high_risk_keywords: [
      'drop table', 'delete database', 'rm -rf', 'truncate', 'kubectl delete', 'terraform destroy',
      'shutdown', 'format', 'wipe', 'vault delete', 'aws s3 rm', 'gcloud sql instances delete',
    ],
    med_risk_hints: ['overwrite', 'migrate', 'secrets', 'credentials', 'prod', 'production'],
  };
}
