import fs from 'node:fs';
import path from 'node:path';

/**
 * Demo files for trying out a plan: `tmp/output.txt` and an empty
 * `old/legacy.sql`. Existing files are left alone. Returns the
 * workspace-relative paths that were created.
 */
export function seedDemoFiles(root: string): string[] {
  const files: Array<[string, string]> = [
    ['tmp/output.txt', 'hello'],
    ['old/legacy.sql', ''],
  ];

  const created: string[] = [];
  for (const [rel, content] of files) {
    const target = path.join(root, rel);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    if (fs.existsSync(target)) continue;
    fs.writeFileSync(target, content, 'utf-8');
    created.push(rel);
  }
  return created;
}
