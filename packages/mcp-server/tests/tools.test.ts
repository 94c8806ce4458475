// packages/mcp-server/tests/tools.test.ts — MCP tool handler tests

import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Project } from '@sweeper/core';
import { RunStore, openDatabase, openProject } from '@sweeper/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { callTool, TOOL_DEFINITIONS } from '../src/server.js';
import { handleAnalyze } from '../src/tools/analyze.js';
import { handleCleanup } from '../src/tools/cleanup.js';
import { handleMark } from '../src/tools/mark.js';

const TEST_DIR = join(tmpdir(), `sweeper-mcp-test-${Date.now()}`);
const SRC = join(TEST_DIR, 'src', 'main', 'java', 'app');
const CONTROLLER_PATH = 'src/main/java/app/OrderController.java';
const EMPTY_PATH = 'src/main/java/app/Empty.java';

const CONTROLLER = `package app;

@RestController
public class OrderController {
    @Deprecated
    public String legacy() {
        return format();
    }

    private String format() { return "x"; }
}
`;

let db: ReturnType<typeof openDatabase>;
let runStore: RunStore;
let project: Project;

function parseText(result: { content: { type: 'text'; text: string }[] }): unknown {
  return JSON.parse(result.content[0]?.text ?? 'null');
}

beforeEach(() => {
  mkdirSync(SRC, { recursive: true });
  writeFileSync(join(TEST_DIR, CONTROLLER_PATH), CONTROLLER, 'utf-8');
  writeFileSync(join(TEST_DIR, EMPTY_PATH), '//Controller Cleaner\npackage app;\n\nclass Empty {}\n', 'utf-8');
  db = openDatabase(':memory:');
  runStore = new RunStore(db);
  project = openProject({ projectDir: TEST_DIR });
});

afterEach(() => {
  db.close();
  rmSync(TEST_DIR, { recursive: true, force: true });
});

describe('TOOL_DEFINITIONS', () => {
  it('lists the three tools', () => {
    expect(TOOL_DEFINITIONS.map((t) => t.name)).toEqual(['sweeper_analyze', 'sweeper_cleanup', 'sweeper_mark']);
  });
});

describe('handleAnalyze', () => {
  it('returns the analysis with its summary lines', async () => {
    const result = await handleAnalyze(project, {});
    expect(parseText(result)).toMatchObject({
      mode: 'deprecated-controllers',
      total: 2,
      summary: [
        'Unused deprecated controller methods: 1',
        `  - OrderController.legacy(0) (${CONTROLLER_PATH})`,
        'Methods that become unused: 1',
        `  - OrderController.format(0) (${CONTROLLER_PATH})`,
      ],
    });
    expect(readFileSync(join(TEST_DIR, CONTROLLER_PATH), 'utf-8')).toBe(CONTROLLER);
  });

  it('analyzes marked files', async () => {
    const result = await handleAnalyze(project, { mode: 'marked-files' });
    expect(parseText(result)).toMatchObject({ files: [EMPTY_PATH], total: 1 });
  });

  it('rejects files for a marked-file analysis', async () => {
    await expect(handleAnalyze(project, { mode: 'marked-files', files: [EMPTY_PATH] })).rejects.toThrow(
      'files only apply to mode deprecated-controllers',
    );
  });

  it('throws ZodError for an unknown mode', async () => {
    await expect(handleAnalyze(project, { mode: 'everything' })).rejects.toThrow(ZodError);
  });
});

describe('handleCleanup', () => {
  it('only previews without confirm', async () => {
    const result = await handleCleanup(project, runStore, { mode: 'deprecated-controllers' });
    expect(parseText(result)).toMatchObject({ applied: false, total: 2, files: [CONTROLLER_PATH] });
    expect(readFileSync(join(TEST_DIR, CONTROLLER_PATH), 'utf-8')).toBe(CONTROLLER);
    expect(runStore.list()).toEqual([]);
  });

  it('removes and records the run with confirm: true', async () => {
    const result = await handleCleanup(project, runStore, { mode: 'deprecated-controllers', confirm: true });

    expect(result.isError).toBe(false);
    expect(parseText(result)).toMatchObject({ applied: true, outcome: 'completed', totalRemoved: 2, passesRun: 2 });
    expect(readFileSync(join(TEST_DIR, CONTROLLER_PATH), 'utf-8')).toBe(
      '//Controller Cleaner\npackage app;\n\n@RestController\npublic class OrderController {\n}\n',
    );
    expect(runStore.list().map((r) => r.totalRemoved)).toEqual([2]);
  });

  it('cleans marked files', async () => {
    const result = await handleCleanup(project, runStore, { mode: 'marked-files', confirm: true });
    expect(parseText(result)).toMatchObject({ outcome: 'completed', unmarkedFiles: [EMPTY_PATH] });
    expect(readFileSync(join(TEST_DIR, EMPTY_PATH), 'utf-8')).toBe('package app;\n\n');
  });

  it('requires a mode', async () => {
    await expect(handleCleanup(project, runStore, { confirm: true })).rejects.toThrow(ZodError);
  });
});

describe('handleMark', () => {
  it('marks, lists and unmarks', async () => {
    expect(parseText(await handleMark(project, { action: 'mark', files: [CONTROLLER_PATH, EMPTY_PATH] }))).toEqual({
      marked: [CONTROLLER_PATH],
    });
    expect(parseText(await handleMark(project, { action: 'list' }))).toEqual({
      files: [EMPTY_PATH, CONTROLLER_PATH],
      count: 2,
    });
    expect(parseText(await handleMark(project, { action: 'unmark', files: [CONTROLLER_PATH] }))).toEqual({
      unmarked: [CONTROLLER_PATH],
    });
    expect(readFileSync(join(TEST_DIR, CONTROLLER_PATH), 'utf-8')).toBe(CONTROLLER);
  });

  it('requires files for mark', async () => {
    await expect(handleMark(project, { action: 'mark' })).rejects.toThrow('files is required for mark and unmark');
  });

  it('rejects files that are not project sources', async () => {
    await expect(handleMark(project, { action: 'mark', files: ['README.md'] })).rejects.toThrow(
      'Not Java sources of this project: README.md',
    );
  });
});

describe('callTool', () => {
  it('turns handler errors into isError results', async () => {
    const result = await callTool(project, runStore, 'sweeper_mark', { action: 'mark' });
    expect(result).toEqual({
      content: [{ type: 'text', text: 'Error: files is required for mark and unmark' }],
      isError: true,
    });
  });

  it('reports unknown tools', async () => {
    const result = await callTool(project, runStore, 'sweeper_nope', {});
    expect(result).toEqual({ content: [{ type: 'text', text: 'Unknown tool: sweeper_nope' }], isError: true });
  });
});
