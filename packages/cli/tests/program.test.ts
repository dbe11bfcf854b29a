/**
 * CLI Program Tests
 *
 * Each test gets its own GLYPHDECK_HOME; remote sheets come from a fake
 * fetch and the study screen is replaced by a recorder.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import type { Command } from 'commander';
import type { FetchLike, StudyTimer, StudyView } from 'glyphdeck-core';
import { createProgram } from '../src/index.js';

// =============================================================================
// Test Helpers
// =============================================================================

const KANJI_CSV = 'id,character,reading,meaning\n1,山,san,mountain\n2,川,sen,river\n';
const SHEET_URL = 'https://docs.google.com/spreadsheets/d/ABC123/edit';

interface StudyRun {
  title: string;
  view: StudyView;
  running: boolean;
}

describe('glyphdeck CLI', () => {
  let tempDir: string;
  let home: string;
  let csvPath: string;
  let studyRuns: StudyRun[];
  let fetchedUrls: string[];
  let logged: unknown[][];
  let written: string[];

  const fakeFetch: FetchLike = async (url) => {
    fetchedUrls.push(url);
    return { ok: true, status: 200, statusText: 'OK', text: async () => KANJI_CSV };
  };

  const recordStudy = async (timer: StudyTimer, title: string): Promise<void> => {
    studyRuns.push({ title, view: timer.view(), running: timer.isRunning });
  };

  function buildProgram(): Command {
    const program = createProgram({
      env: { GLYPHDECK_HOME: home },
      fetch: fakeFetch,
      runStudyScreen: recordStudy,
    });
    for (const command of [program, ...program.commands]) {
      command.exitOverride().configureOutput({ writeErr: () => undefined });
    }
    return program;
  }

  async function run(...args: string[]): Promise<void> {
    await buildProgram().parseAsync(args, { from: 'user' });
  }

  function stdout(): string {
    return written.join('');
  }

  /** Messages passed to the status helpers, without their symbols */
  function messages(): string[] {
    return logged.map((args) => String(args[1]));
  }

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'glyphdeck-cli-test-'));
    home = path.join(tempDir, 'home');
    csvPath = path.join(tempDir, 'kanji.csv');
    await fs.writeFile(csvPath, KANJI_CSV, 'utf-8');
    studyRuns = [];
    fetchedUrls = [];
    process.exitCode = undefined;

    logged = [];
    written = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      logged.push(args);
    });
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      written.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  // ===========================================================================
  // Registration
  // ===========================================================================

  it('should register every command', () => {
    const names = createProgram().commands.map((c) => c.name());
    expect(names).toEqual(['load', 'sheet', 'list', 'study', 'prune']);
  });

  it('should accept a global verbose flag', () => {
    const program = createProgram();
    expect(program.options.map((o) => o.long)).toContain('--verbose');
  });

  // ===========================================================================
  // load / sheet / list
  // ===========================================================================

  describe('load', () => {
    it('should cache a local file and list it', async () => {
      await run('load', csvPath, '--name', 'kanji');
      await run('list', '--format', 'json');

      expect(process.exitCode).toBeUndefined();
      const entries: unknown = JSON.parse(stdout());
      expect(entries).toMatchObject([{ name: 'kanji', sourceKind: 'local', source: csvPath, count: 2 }]);
    });

    it('should fail with exit code 1 for a missing file and cache nothing', async () => {
      await run('load', path.join(tempDir, 'missing.csv'));
      expect(process.exitCode).toBe(1);

      process.exitCode = undefined;
      await run('list', '-f', 'json');
      expect(JSON.parse(stdout())).toEqual([]);
    });

    it('should start studying the loaded records with --study', async () => {
      await run('load', csvPath, '--study');

      expect(studyRuns).toHaveLength(1);
      expect(studyRuns[0]?.title).toBe('kanji');
      expect(studyRuns[0]?.view.total).toBe(2);
    });
  });

  describe('sheet', () => {
    it('should fetch the export URL and cache the sheet', async () => {
      await run('sheet', SHEET_URL, '-n', 'Week 1', '--gid', '5');
      await run('list', '-f', 'json');

      expect(fetchedUrls).toEqual(['https://docs.google.com/spreadsheets/d/ABC123/export?format=csv&gid=5']);
      expect(JSON.parse(stdout())).toMatchObject([{ name: 'Week 1', sourceKind: 'remote', source: SHEET_URL }]);
    });

    it('should reject a URL without a sheet id', async () => {
      await run('sheet', 'https://example.com/nothing');

      expect(process.exitCode).toBe(1);
      expect(fetchedUrls).toEqual([]);
    });
  });

  describe('list', () => {
    it('should explain an empty cache', async () => {
      await run('list');

      expect(messages()).toEqual([
        'No cached datasets yet. Load one with `glyphdeck load <file>` or `glyphdeck sheet <url>`.',
      ]);
    });

    it('should print a table with one row per entry', async () => {
      await run('load', csvPath);
      await run('list');

      const lines = stdout().trimEnd().split('\n');
      expect(lines[0]?.split(/\s+/)).toEqual(['#', 'name', 'kind', 'records', 'cached', 'source']);
      expect(lines).toHaveLength(3);
      expect(lines[2]?.startsWith('1  kanji  local')).toBe(true);
    });

    it('should reject an unknown format', async () => {
      await expect(run('list', '--format', 'xml')).rejects.toMatchObject({
        code: 'commander.invalidArgument',
      });
    });
  });

  // ===========================================================================
  // study
  // ===========================================================================

  describe('study', () => {
    it('should explain that nothing has been loaded yet', async () => {
      await run('study');

      expect(process.exitCode).toBe(1);
      expect(messages()).toEqual([
        'No cached datasets yet. Load one with `glyphdeck load <file>` or `glyphdeck sheet <url>`.',
      ]);
    });

    it('should open the most recent dataset in stored order with --no-shuffle', async () => {
      await run('load', csvPath, '-n', 'kanji');
      await run('study', '--no-shuffle');

      expect(studyRuns).toHaveLength(1);
      expect(studyRuns[0]?.title).toBe('kanji');
      expect(studyRuns[0]?.view).toEqual({
        record: { character: '山', reading: 'san', meaning: 'mountain' },
        phase: 'character',
        position: 1,
        total: 2,
      });
    });

    it('should report an unknown selector', async () => {
      await run('load', csvPath);
      await run('study', '5');

      expect(process.exitCode).toBe(1);
      expect(messages()).toContain('No cached dataset matches "5". Run `glyphdeck list` to see them.');
      expect(studyRuns).toEqual([]);
    });

    it('should report a dataset whose cache file is gone', async () => {
      await run('load', csvPath, '-n', 'kanji');
      await fs.rm(path.join(home, 'datasets'), { recursive: true, force: true });
      await run('study', 'kanji');

      expect(process.exitCode).toBe(1);
      expect(messages()).toContain(`The cached data for "kanji" is missing. Load ${csvPath} again.`);
    });

    it('should validate phase durations', async () => {
      await expect(run('study', '--character-seconds', '11')).rejects.toMatchObject({
        code: 'commander.invalidArgument',
      });
    });
  });

  // ===========================================================================
  // prune / configuration
  // ===========================================================================

  describe('prune', () => {
    it('should remove files superseded by a reload', async () => {
      await run('load', csvPath);
      await run('load', csvPath);
      await run('prune', '-f', 'json');

      const result: unknown = JSON.parse(stdout());
      expect(result).toEqual({ removed: [expect.stringMatching(/^kanji_\d{8}_\d{6}\.json$/)] });
    });

    it('should say when there is nothing to prune', async () => {
      await run('prune');

      expect(messages()).toEqual(['Nothing to prune.']);
    });
  });

  it('should report an invalid config.json and exit with code 1', async () => {
    await fs.mkdir(home, { recursive: true });
    await fs.writeFile(path.join(home, 'config.json'), JSON.stringify({ answerSeconds: 0 }));

    await run('list');

    expect(process.exitCode).toBe(1);
    expect(messages()[0]).toBe('Invalid configuration: 1 validation error(s)');
  });
});
