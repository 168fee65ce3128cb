import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, test, expect } from 'vitest';
import {
  agentOutputPath,
  branchName,
  configPath,
  findWorkspaceRoot,
  isStatusFile,
  plurbPath,
  promptFilePath,
  statusFilePath,
  todoPath,
} from './paths.js';

describe('workspace paths', () => {
  test('given a root, should place files beside it', () => {
    expect(configPath('/ws')).toBe('/ws/pluribus.config');
    expect(todoPath('/ws')).toBe('/ws/todo.md');
    expect(plurbPath('/ws', 'fix-bug-ab12c')).toBe('/ws/worktrees/fix-bug-ab12c');
  });

  test('given a worktree, should keep plurb state under .pluribus', () => {
    const wt = '/ws/worktrees/fix-bug-ab12c';
    expect(statusFilePath(wt)).toBe(`${wt}/.pluribus/status`);
    expect(agentOutputPath(wt)).toBe(`${wt}/.pluribus/agent-output.json`);
    expect(promptFilePath(wt)).toBe(`${wt}/.pluribus/prompt.md`);
  });
});

describe('isStatusFile', () => {
  test('given a plurb status path, should return true', () => {
    expect(isStatusFile('fix-bug-ab12c/.pluribus/status')).toBe(true);
  });

  test('given other files, should return false', () => {
    expect(isStatusFile('fix-bug-ab12c/.pluribus/prompt.md')).toBe(false);
    expect(isStatusFile('fix-bug-ab12c/src/status')).toBe(false);
    expect(isStatusFile('.pluribus/status')).toBe(false);
  });
});

describe('branchName', () => {
  test('given a plurb id, should place it under the pluribus namespace', () => {
    expect(branchName('fix-bug-ab12c')).toBe('pluribus/fix-bug-ab12c');
  });
});

describe('findWorkspaceRoot', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pluribus-paths-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  test('given a nested directory, should walk up to the config', async () => {
    await fs.writeFile(configPath(tmpDir), 'repoPath: myrepo\n');
    const nested = path.join(tmpDir, 'worktrees', 'p', 'src');
    await fs.mkdir(nested, { recursive: true });

    expect(await findWorkspaceRoot(nested)).toBe(tmpDir);
  });

  test('given the root itself, should return it', async () => {
    await fs.writeFile(configPath(tmpDir), 'repoPath: myrepo\n');

    expect(await findWorkspaceRoot(tmpDir)).toBe(tmpDir);
  });
});
