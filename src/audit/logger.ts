/**
 * Audit Log — checksummed JSONL, one line per executed batch
 *
 * Each line is `{"checksum": <sha256 hex>, "record": <AuditRecord>}` where
 * the checksum covers `JSON.stringify(record)` exactly as written.
 * Lines are only ever appended. Checksums are per line and not chained,
 * so removing or reordering whole lines is not detected here.
 */

import fs from 'node:fs';
import path from 'node:path';
import crypto from 'node:crypto';
import type { ActionOutcome, AuditRecord } from '../core/types.js';

export interface AuditLine {
  checksum: string;
  record: AuditRecord;
}

export interface VerifyResult {
  valid: boolean;
  entryCount: number;
  errors: string[];
}

export function checksumOf(record: unknown): string {
  return crypto.createHash('sha256').update(JSON.stringify(record), 'utf8').digest('hex');
}

export class AuditLog {
  private logPath: string;

  constructor(logPath: string) {
    this.logPath = logPath;
  }

  get path(): string {
    return this.logPath;
  }

  /**
   * Append one record. The line goes out in a single write and is synced
   * before returning. I/O errors are thrown.
   */
  append(record: AuditRecord): AuditLine {
    const line: AuditLine = { checksum: checksumOf(record), record };

    fs.mkdirSync(path.dirname(this.logPath), { recursive: true });
    const fd = fs.openSync(this.logPath, 'a');
    try {
      fs.writeSync(fd, JSON.stringify(line) + '\n');
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }

    return line;
  }

  /**
   * The record on the last line, or null when the log is missing, empty,
   * or that line does not parse.
   */
  lastRecord(): AuditRecord | null {
    let content: string;
    try {
      content = fs.readFileSync(this.logPath, 'utf-8');
    } catch {
      return null;
    }

    const lines = content.split('\n').filter((line) => line.trim());
    const last = lines[lines.length - 1];
    if (last === undefined) return null;

    try {
      const parsed: unknown = JSON.parse(last);
      if (!isObject(parsed)) return null;
      const record = parsed.record;
      return isAuditRecord(record) ? record : null;
    } catch {
      return null;
    }
  }

  /**
   * Recompute every line's checksum over its stored record.
   */
  verify(): VerifyResult {
    if (!fs.existsSync(this.logPath)) {
      return { valid: true, entryCount: 0, errors: [] };
    }

    const lines = fs.readFileSync(this.logPath, 'utf-8').split('\n');
    const errors: string[] = [];
    let count = 0;

    lines.forEach((line, index) => {
      if (!line.trim()) return;
      count++;
      const lineNo = index + 1;

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        errors.push(`Malformed entry at line ${lineNo}`);
        return;
      }

      if (!isObject(parsed) || typeof parsed.checksum !== 'string' || !('record' in parsed)) {
        errors.push(`Malformed entry at line ${lineNo}`);
        return;
      }
      if (checksumOf(parsed.record) !== parsed.checksum) {
        errors.push(`Checksum mismatch at line ${lineNo}`);
      }
    });

    return { valid: errors.length === 0, entryCount: count, errors };
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isOutcome(value: unknown): value is ActionOutcome {
  return isObject(value)
    && typeof value.raw === 'string'
    && typeof value.ok === 'boolean'
    && typeof value.message === 'string';
}

export function isAuditRecord(value: unknown): value is AuditRecord {
  return isObject(value)
    && typeof value.ts === 'string'
    && typeof value.env === 'string'
    && typeof value.task === 'string'
    && (value.risk === 'Low' || value.risk === 'Medium' || value.risk === 'High')
    && isStringArray(value.reasons)
    && typeof value.approved === 'boolean'
    && typeof value.approver_note === 'string'
    && typeof value.pre_snapshot === 'string'
    && isOutcomeList(value.results);
}

function isOutcomeList(value: unknown): value is ActionOutcome[] {
  return Array.isArray(value) && value.every(isOutcome);
}
