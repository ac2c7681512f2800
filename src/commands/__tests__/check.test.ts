/**
 * Tests for the check command, run against node packages written to a temp directory
 */

import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import fs from 'fs-extra';
import path from 'path';
import os from 'os';
import ora from 'ora';
import { check, exitCodeFor } from '../check.js';
import { DiscoveryError } from '../../errors.js';

const spinner = vi.hoisted(() => ({
  start: vi.fn(),
  succeed: vi.fn(),
  warn: vi.fn(),
  fail: vi.fn(),
}));

vi.mock('ora', () => ({
  default: vi.fn(() => spinner),
}));

async function writeNodePackage(dir: string, nodes: Record<string, string[]>): Promise<void> {
  const classes = Object.entries(nodes).map(([id, types]) => {
    const items = types.map((t) => `"${t}"`).join(', ');
    return `class ${id}:\n    RETURN_TYPES = (${items}${types.length === 1 ? ',' : ''})\n`;
  });
  const entries = Object.keys(nodes).map((id) => `    "${id}": ${id},`);
  const mapping = `NODE_CLASS_MAPPINGS = {\n${entries.join('\n')}\n}\n`;

  await fs.outputFile(path.join(dir, '__init__.py'), [...classes, mapping].join('\n'), 'utf-8');
}

describe('check command', () => {
  let testDir: string;
  let baseDir: string;
  let prDir: string;
  let mockConsoleLog: MockInstance<typeof console.log>;

  beforeEach(async () => {
    vi.clearAllMocks();
    spinner.start.mockReturnValue(spinner);

    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'check-command-test-'));
    baseDir = path.join(testDir, 'base_repo');
    prDir = path.join(testDir, 'pr_repo');

    mockConsoleLog = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    mockConsoleLog.mockRestore();
    await fs.remove(testDir);
  });

  test('passes when return types are unchanged', async () => {
    await writeNodePackage(baseDir, { LoadImage: ['IMAGE'] });
    await writeNodePackage(prDir, { LoadImage: ['IMAGE'] });

    const report = await check(baseDir, prDir);

    expect(report.breaking).toBe(false);
    expect(mockConsoleLog).toHaveBeenCalledWith(expect.stringContaining('✓ LoadImage: (IMAGE)'));
    expect(mockConsoleLog).toHaveBeenCalledWith(
      expect.stringContaining('✅ No breaking changes detected (1 node compared)')
    );
  });

  test('fails when an output is added to an existing node', async () => {
    await writeNodePackage(baseDir, { LoadImage: ['IMAGE'] });
    await writeNodePackage(prDir, { LoadImage: ['IMAGE', 'MASK'] });

    const report = await check(baseDir, prDir);

    expect(report.breaking).toBe(true);
    expect(report.findings.filter((f) => f.isBreaking).map((f) => f.identifier)).toEqual(['LoadImage']);
    expect(mockConsoleLog).toHaveBeenCalledWith(
      expect.stringContaining('✗ LoadImage: (IMAGE) → (IMAGE, MASK)')
    );
    expect(mockConsoleLog).toHaveBeenCalledWith(expect.stringContaining('position 1: (none) → MASK'));
  });

  test('reports renamed nodes as removed and added without failing', async () => {
    await writeNodePackage(baseDir, { A: ['IMAGE'] });
    await writeNodePackage(prDir, { B: ['IMAGE'] });

    const report = await check(baseDir, prDir);

    expect(report.breaking).toBe(false);
    expect(report.findings).toEqual([]);
    expect(report.removed).toEqual(['A']);
    expect(report.added).toEqual(['B']);
    expect(mockConsoleLog).toHaveBeenCalledWith(expect.stringContaining('- A (removed)'));
    expect(mockConsoleLog).toHaveBeenCalledWith(expect.stringContaining('+ B (added)'));
  });

  test('fails on removed nodes with --fail-on-removed', async () => {
    await writeNodePackage(baseDir, { A: ['IMAGE'] });
    await writeNodePackage(prDir, { B: ['IMAGE'] });

    const report = await check(baseDir, prDir, { failOnRemoved: true });

    expect(report.breaking).toBe(true);
  });

  test('accepts appended outputs with --allow-appended', async () => {
    await writeNodePackage(baseDir, { LoadImage: ['IMAGE'] });
    await writeNodePackage(prDir, { LoadImage: ['IMAGE', 'MASK'] });

    const report = await check(baseDir, prDir, { allowAppended: true });

    expect(report.breaking).toBe(false);
  });

  test('fails when outputs are reordered', async () => {
    await writeNodePackage(baseDir, { X: ['IMAGE', 'MASK'] });
    await writeNodePackage(prDir, { X: ['MASK', 'IMAGE'] });

    const report = await check(baseDir, prDir);

    expect(report.breaking).toBe(true);
    expect(mockConsoleLog).toHaveBeenCalledWith(expect.stringContaining('position 0: IMAGE → MASK'));
    expect(mockConsoleLog).toHaveBeenCalledWith(expect.stringContaining('position 1: MASK → IMAGE'));
  });

  test('aborts with DiscoveryError before printing a report', async () => {
    await fs.outputFile(path.join(baseDir, '__init__.py'), 'WEB_DIRECTORY = "./js"\n', 'utf-8');
    await writeNodePackage(prDir, { LoadImage: ['IMAGE'] });

    await expect(check(baseDir, prDir)).rejects.toThrow(DiscoveryError);

    expect(spinner.fail).toHaveBeenCalledWith(`Failed to load base nodes from ${baseDir}`);
    expect(vi.mocked(ora)).toHaveBeenCalledTimes(1);
    expect(mockConsoleLog).not.toHaveBeenCalled();
  });

  test('shows progress for each checkout', async () => {
    await writeNodePackage(baseDir, { A: ['IMAGE'], B: [] });
    await writeNodePackage(prDir, { A: ['IMAGE'] });

    await check(baseDir, prDir);

    expect(vi.mocked(ora)).toHaveBeenCalledWith(`Loading base nodes from ${baseDir}...`);
    expect(vi.mocked(ora)).toHaveBeenCalledWith(`Loading candidate nodes from ${prDir}...`);
    expect(spinner.succeed).toHaveBeenCalledWith('Loaded 2 nodes from base (python)');
    expect(spinner.succeed).toHaveBeenCalledWith('Loaded 1 node from candidate (python)');
  });

  test('warns about nodes that could not be read', async () => {
    await writeNodePackage(baseDir, { A: ['IMAGE'] });
    await fs.outputFile(
      path.join(prDir, '__init__.py'),
      'class A:\n    RETURN_TYPES = ("IMAGE",)\nNODE_CLASS_MAPPINGS = {"A": A, "Gone": Gone}\n',
      'utf-8'
    );

    const report = await check(baseDir, prDir);

    expect(report.breaking).toBe(false);
    expect(spinner.warn).toHaveBeenCalledWith('Loaded 1 node from candidate (python) with 1 warning(s)');
    expect(mockConsoleLog).toHaveBeenCalledWith(
      expect.stringContaining('⚠ candidate __init__.py:3: class Gone for node "Gone" not found')
    );
  });

  test('prints the report as JSON with --json', async () => {
    await writeNodePackage(baseDir, { LoadImage: ['IMAGE'] });
    await writeNodePackage(prDir, { LoadImage: [] });

    await check(baseDir, prDir, { json: true });

    expect(mockConsoleLog).toHaveBeenCalledTimes(1);
    const output = JSON.parse(String(mockConsoleLog.mock.calls[0][0]));
    expect(output.breaking).toBe(true);
    expect(output.findings).toEqual([
      {
        identifier: 'LoadImage',
        baseReturnTypes: ['IMAGE'],
        candidateReturnTypes: [],
        isBreaking: true,
        mismatches: [{ index: 0, base: 'IMAGE' }],
      },
    ]);
  });

  test('reads manifests when the checkouts ship one', async () => {
    await fs.outputJson(path.join(baseDir, 'node-manifest.json'), {
      nodes: { Sampler: { returnTypes: ['LATENT'] } },
    });
    await fs.outputJson(path.join(prDir, 'node-manifest.json'), {
      nodes: { Sampler: { returnTypes: ['IMAGE'] } },
    });

    const report = await check(baseDir, prDir);

    expect(report.breaking).toBe(true);
    expect(spinner.succeed).toHaveBeenCalledWith('Loaded 1 node from base (manifest)');
  });

  test('compares the class each entry names when class names repeat', async () => {
    const entry = [
      'from . import image, video',
      'NODE_CLASS_MAPPINGS = {"ImageLoader": image.Loader, "VideoLoader": video.Loader}',
      '',
    ].join('\n');
    for (const dir of [baseDir, prDir]) {
      await fs.outputFile(path.join(dir, '__init__.py'), entry, 'utf-8');
      await fs.outputFile(path.join(dir, 'image.py'), 'class Loader:\n    RETURN_TYPES = ("IMAGE",)\n', 'utf-8');
    }
    await fs.outputFile(path.join(baseDir, 'video.py'), 'class Loader:\n    RETURN_TYPES = ("VIDEO",)\n', 'utf-8');
    await fs.outputFile(
      path.join(prDir, 'video.py'),
      'class Loader:\n    RETURN_TYPES = ("VIDEO", "AUDIO")\n',
      'utf-8'
    );

    const report = await check(baseDir, prDir);

    expect(report.breaking).toBe(true);
    expect(report.findings.filter((f) => f.isBreaking).map((f) => f.identifier)).toEqual(['VideoLoader']);
    expect(exitCodeFor(report)).toBe(1);
  });

  test('maps the report to the process exit code', async () => {
    await writeNodePackage(baseDir, { LoadImage: ['IMAGE'] });
    await writeNodePackage(prDir, { LoadImage: ['IMAGE'] });

    const passing = await check(baseDir, prDir);
    await writeNodePackage(prDir, { LoadImage: ['MASK'] });
    const failing = await check(baseDir, prDir);

    expect(exitCodeFor(passing)).toBe(0);
    expect(exitCodeFor(failing)).toBe(1);
  });
});
