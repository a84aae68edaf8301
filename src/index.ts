#!/usr/bin/env node

import { Command } from 'commander';
import { resolve } from 'node:path';
import { loadConfig, ConfigError } from './lib/config.js';
import { CLI_NAME } from './lib/branding.js';
import { createDefaultRegistry } from './hooks/index.js';
import { runStage } from './runner/pipeline.js';
import type { HookContext } from './types/context.js';
import type { PrecompileConfig } from './types/config.js';

interface ComponentOptions {
  dir: string;
  name: string;
  parentFolder?: string;
  ranCompile?: boolean;
}

const program = new Command();

let globalConfigPath: string | undefined;

program
  .name(CLI_NAME)
  .description('Classify a plugin checkout and compile it before compatibility testing')
  .version('1.0.0')
  .option('-c, --config <path>', 'Path to configuration file')
  .hook('preAction', (thisCommand) => {
    globalConfigPath = thisCommand.opts<{ config?: string }>().config;
  });

function createContext(config: PrecompileConfig, options: ComponentOptions): HookContext {
  return {
    config,
    component: {
      dir: resolve(options.dir),
      name: options.name,
      parentFolder: options.parentFolder ?? null,
    },
    ranCompile: options.ranCompile ?? false,
  };
}

function fail(prefix: string, error: unknown): never {
  if (error instanceof ConfigError) {
    console.error(`Configuration error: ${error.message}`);
  } else {
    console.error(`${prefix}: ${error instanceof Error ? error.message : String(error)}`);
  }
  process.exit(1);
}

program
  .command('compile')
  .description('Run the checkout and compilation hooks for one plugin')
  .requiredOption('-d, --dir <path>', 'Plugin project directory')
  .requiredOption('-n, --name <name>', 'Plugin name')
  .option('-p, --parent-folder <name>', 'Enclosing multi-module parent folder')
  .option('--ran-compile', 'Treat the plugin as already compiled')
  .action(async (options: ComponentOptions) => {
    try {
      const config = await loadConfig(globalConfigPath);
      const registry = createDefaultRegistry(config);
      let context = createContext(config, options);
      context = await runStage('checkout', context, registry);
      context = await runStage('compilation', context, registry);
      console.log(
        JSON.stringify(
          { ranCompile: context.ranCompile, parentFolder: context.component.parentFolder },
          null,
          2
        )
      );
    } catch (error) {
      fail('Compilation failed', error);
    }
  });

program
  .command('check')
  .description('Report whether the multi-parent compile hook applies to a plugin')
  .requiredOption('-d, --dir <path>', 'Plugin project directory')
  .requiredOption('-n, --name <name>', 'Plugin name')
  .option('-p, --parent-folder <name>', 'Enclosing multi-module parent folder')
  .action(async (options: ComponentOptions) => {
    try {
      const config = await loadConfig(globalConfigPath);
      const registry = createDefaultRegistry(config);
      const context = createContext(config, options);
      for (const hook of registry.getHooksFromStage('compilation')) {
        console.log(`${hook.name}: ${(await hook.check(context)) ? 'applies' : 'skipped'}`);
      }
    } catch (error) {
      fail('Check failed', error);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => fail('Unexpected error', error));
