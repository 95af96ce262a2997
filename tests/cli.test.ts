import fs from 'fs';
import path from 'path';
import { CliIo, main, USAGE } from '../src/cli';
import { initLogging, LogEntry, LogLevel, resetLogging } from '../src/logger';
import { makeWorkspace, removeWorkspace, writeFixture } from './helpers/fixtures';

describe('report-viewer CLI', () => {
  let base: string;
  let projectsRoot: string;
  let stdout: string[];
  let stderr: string[];
  let entries: LogEntry[];
  let io: CliIo;

  beforeEach(() => {
    ({ base, projectsRoot } = makeWorkspace());
    stdout = [];
    stderr = [];
    entries = [];
    // Installed first, so the command's own initLogging only adds a warning.
    initLogging({ level: LogLevel.Debug, handler: (entry) => entries.push(entry) });
    io = {
      env: { REPORT_VIEWER_PROJECTS_DIR: projectsRoot, REPORT_VIEWER_CACHE_DIR: path.join(base, 'cache') },
      cwd: base,
      stdout: (text) => stdout.push(text),
      stderr: (text) => stderr.push(text),
    };
  });

  afterEach(() => {
    resetLogging();
    removeWorkspace(base);
  });

  test('an unknown command prints usage and fails', async () => {
    expect(await main(['bogus'], io)).toBe(1);
    expect(stderr).toEqual([`${USAGE}\n`]);
    expect(stdout).toEqual([]);
  });

  test('no command prints usage and fails', async () => {
    expect(await main([], io)).toBe(1);
    expect(stderr).toEqual([`${USAGE}\n`]);
  });

  describe('check', () => {
    test('fails for a project that does not exist', async () => {
      expect(await main(['check', '2026-09-09_missing'], io)).toBe(1);
      expect(stdout).toEqual([`[ERROR] Project directory not found: ${path.join(projectsRoot, '2026-09-09_missing')}\n`]);
    });

    test('fails when there are no projects at all', async () => {
      expect(await main(['check'], io)).toBe(1);
      expect(stdout).toEqual([]);
      expect(entries.find((e) => e.message === 'No projects found')?.context).toMatchObject({ projectsRoot });
    });

    test('inspects the latest project by default', async () => {
      writeFixture(projectsRoot, '2026-01-01_old/project_summary.json', {});
      writeFixture(projectsRoot, '2026-03-03_new/FinalOutput/overview_report.html', '<html></html>');

      expect(await main(['check'], io)).toBe(0);
      const lines = stdout.join('').split('\n');
      expect(lines[0]).toBe('Project: 2026-03-03_new');
      expect(lines).toContain('[OK] FinalOutput/overview_report.html (13 bytes)');
      expect(lines).toContain('  http://127.0.0.1:5001/project/2026-03-03_new/report');
    });

    test('rejects an unsafe project name', async () => {
      await expect(main(['check', '../etc'], io)).rejects.toMatchObject({
        typedError: { code: 'VALIDATION.UNSAFE_PATH' },
      });
    });
  });

  test('clear-cache empties the configured cache directory', async () => {
    const cacheDir = path.join(base, 'cache');
    writeFixture(cacheDir, 'a.txt', 'x');

    expect(await main(['clear-cache'], io)).toBe(0);
    expect(stdout).toEqual([`Removed 1 entries from ${cacheDir}\n`]);
    expect(fs.readdirSync(cacheDir)).toEqual([]);
  });
});
