/**
 * YAML Policy Parser
 *
 * Parses and validates plangate policy files:
 *
 *   prod_locked: true
 *   allowed_actions: [write, append, delete_file, move, make_dir]
 *   high_risk_keywords: ["rm -rf", "drop table"]
 *   med_risk_hints: [migrate, secrets]
 *
 * Every key is optional. A missing key, or one of the wrong type, takes
 * its value from the default policy.
 */

import fs from 'node:fs';
import { parse as yamlParse } from 'yaml';
import type { SandboxPolicy } from './engine.js';
import { getDefaultPolicy } from './defaults.js';

const LIST_KEYS = ['allowed_actions', 'high_risk_keywords', 'med_risk_hints'] as const;
const KNOWN_KEYS: readonly string[] = ['prod_locked', ...LIST_KEYS];

export class PolicyParser {
  /**
   * Parse a YAML policy file.
   */
  static parseFile(filePath: string): SandboxPolicy {
    const content = fs.readFileSync(filePath, 'utf-8');
    return PolicyParser.parse(content);
  }

  /**
   * Parse a YAML policy string, filling gaps from the defaults.
   * Throws on YAML syntax errors.
   */
  static parse(yamlContent: string): SandboxPolicy {
    return PolicyParser.fromValue(yamlParse(yamlContent));
  }

  static fromValue(raw: unknown): SandboxPolicy {
    const policy = getDefaultPolicy();
    if (!isRecord(raw)) return policy;

    if (typeof raw.prod_locked === 'boolean') {
      policy.prod_locked = raw.prod_locked;
    }
    for (const key of LIST_KEYS) {
      const value = raw[key];
      if (isStringList(value)) {
        policy[key] = [...value];
      }
    }

    return policy;
  }

  /**
   * Validate a parsed YAML document and return any errors.
   */
  static validate(raw: unknown): string[] {
    const errors: string[] = [];

    if (raw === null || raw === undefined) {
      return errors;
    }
    if (!isRecord(raw)) {
      errors.push('Policy must be a YAML mapping');
      return errors;
    }

    if (raw.prod_locked !== undefined && typeof raw.prod_locked !== 'boolean') {
      errors.push('"prod_locked" must be true or false');
    }

    for (const key of LIST_KEYS) {
      const value = raw[key];
      if (value !== undefined && !isStringList(value)) {
        errors.push(`"${key}" must be a list of strings`);
      }
    }

    for (const key of Object.keys(raw)) {
      if (!KNOWN_KEYS.includes(key)) {
        errors.push(`Unknown key "${key}"`);
      }
    }

    return errors;
  }
}

/**
 * Load the policy at `filePath`. A missing file gives the defaults;
 * an unreadable or broken one gives the defaults with a warning.
 */
export function loadPolicy(filePath: string): SandboxPolicy {
  if (!fs.existsSync(filePath)) {
    return getDefaultPolicy();
  }

  try {
    const raw: unknown = yamlParse(fs.readFileSync(filePath, 'utf-8'));
    for (const error of PolicyParser.validate(raw)) {
      console.warn(`  [policy] ${filePath}: ${error}`);
    }
    return PolicyParser.fromValue(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.warn(`  [policy] Could not load ${filePath}, using defaults: ${message}`);
    return getDefaultPolicy();
  }
}

/**
 * Holds the current policy value. `reload()` re-reads the file and
 * replaces the value wholesale; evaluation always gets the value passed in.
 */
export class PolicySource {
  private filePath: string;
  private policy: SandboxPolicy;

  constructor(filePath: string) {
    this.filePath = filePath;
    this.policy = loadPolicy(filePath);
  }

  get current(): SandboxPolicy {
    return this.policy;
  }

  get path(): string {
    return this.filePath;
  }

  reload(): SandboxPolicy {
    this.policy = loadPolicy(this.filePath);
    return this.policy;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}
