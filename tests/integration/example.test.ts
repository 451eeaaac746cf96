import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { example } from '../../src/commands/example.js';
import { check } from '../../src/core/check.js';
import { createConfig } from '../../src/core/config.js';
import { loadDescriptor } from '../../src/core/descriptor-loader.js';

let tempDir: string;

describe('dpcheck example', () => {
  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'dpcheck-test-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  it('writes a descriptor that passes strict checking', async () => {
    const file = join(tempDir, 'datapackage.json');
    await example({ output: file });
    const descriptor = await loadDescriptor(tempDir);
    expect(descriptor.name).toBe('coastal-bird-survey');
    expect(check(descriptor, createConfig({ strict: true }))).toEqual([]);
  });

  it('prints to stdout without --output', async () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const text = await example();
    expect(write).toHaveBeenCalledWith(text);
    expect(JSON.parse(text).resources).toHaveLength(2);
  });
});
