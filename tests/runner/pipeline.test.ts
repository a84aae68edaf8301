import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { runStage } from '@/runner/pipeline.js';
import { createDefaultRegistry } from '@/hooks/index.js';
import { HookRegistry } from '@/hooks/registry.js';
import type { Hook } from '@/types/hooks.js';
import type { HookContext } from '@/types/context.js';
import {
  RecordingRunner,
  createContext,
  createMockConfig,
  evaluateResponder,
  makeTestDir,
  removeTestDir,
} from '../helpers/mocks.js';

function recordingHook(name: string, applies: boolean, calls: string[]): Hook {
  return {
    name,
    stage: 'execution',
    check: () => applies,
    validate: () => {
      calls.push(`${name}:validate`);
    },
    action: async (context: HookContext) => {
      calls.push(`${name}:action`);
      return context;
    },
  };
}

describe('runStage', () => {
  let testDir: string;
  let parentDir: string;
  let pluginDir: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    testDir = await makeTestDir('precompile-pipeline');
    parentDir = join(testDir, 'bom-parent');
    pluginDir = join(parentDir, 'plugin-x');
    await mkdir(pluginDir, { recursive: true });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTestDir(testDir);
  });

  it('should validate then act for applicable hooks only, in order', async () => {
    const calls: string[] = [];
    const registry = new HookRegistry();
    registry.register(recordingHook('first', true, calls));
    registry.register(recordingHook('skipped', false, calls));
    registry.register(recordingHook('last', true, calls));

    await runStage('execution', createContext(pluginDir, 'plugin-x', null), registry);

    expect(calls).toEqual(['first:validate', 'first:action', 'last:validate', 'last:action']);
  });

  it('should classify at checkout and build the multi-module parent at compilation', async () => {
    const runner = new RecordingRunner(evaluateResponder('2.0-SNAPSHOT'));
    const registry = createDefaultRegistry(createMockConfig(), () => runner);

    let context = createContext(pluginDir, 'plugin-x', null);
    context = await runStage('checkout', context, registry);
    context = await runStage('compilation', context, registry);

    expect(context.component.parentFolder).toBe('bom-parent');
    expect(context.ranCompile).toBe(true);
    expect(runner.runs[1]).toMatchObject({
      workingDir: parentDir,
      goals: ['clean', 'install', '-am', '-pl', 'plugin-x'],
    });
  });

  it('should compile only once across repeated compilation stages', async () => {
    const runner = new RecordingRunner(evaluateResponder('2.0'));
    const registry = createDefaultRegistry(createMockConfig(), () => runner);

    let context = await runStage('checkout', createContext(pluginDir, 'plugin-x', null), registry);
    context = await runStage('compilation', context, registry);
    context = await runStage('compilation', context, registry);

    expect(runner.runs.map((run) => run.goals)).toEqual([
      ['-q', 'help:evaluate'],
      ['clean', 'process-test-classes'],
    ]);
  });

  it('should skip compilation for plugins no family claims', async () => {
    const runner = new RecordingRunner();
    const registry = createDefaultRegistry(createMockConfig(), () => runner);

    let context = await runStage('checkout', createContext(pluginDir, 'git-client', null), registry);
    context = await runStage('compilation', context, registry);

    expect(context.ranCompile).toBe(false);
    expect(runner.runs).toEqual([]);
  });
});
