import fs from 'fs';
import os from 'os';
import path from 'path';

/** Fresh temporary directory; the projects root lives at `<base>/projects`. */
export function makeWorkspace(): { base: string; projectsRoot: string } {
  const base = fs.mkdtempSync(path.join(os.tmpdir(), 'report-viewer-'));
  const projectsRoot = path.join(base, 'projects');
  fs.mkdirSync(projectsRoot);
  return { base, projectsRoot };
}

export function removeWorkspace(base: string): void {
  fs.rmSync(base, { recursive: true, force: true });
}

/** Write a file below `root`, creating parent directories. Objects are written as JSON. */
export function writeFixture(root: string, relativePath: string, content: string | Buffer | object): string {
  const filePath = path.join(root, ...relativePath.split('/'));
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const data = typeof content === 'string' || Buffer.isBuffer(content) ? content : JSON.stringify(content);
  fs.writeFileSync(filePath, data);
  return filePath;
}
