/**
 * Build tool runner.
 *
 * Spawns Maven with an argv array (no shell) and captures its combined
 * stdout and stderr into a log file chosen by the caller.
 */

import { spawn } from 'node:child_process';
import { createWriteStream } from 'node:fs';
import { finished } from 'node:stream/promises';
import { FsError } from '../lib/fs.js';
import type { MavenConfig } from '../types/config.js';

/**
 * Free-form -D property assignments, in insertion order.
 */
export type BuildOptions = Readonly<Record<string, string>>;

/**
 * Runs a build in a working directory.
 *
 * Implementations resolve on success and reject with BuildExecutionError
 * when the build fails, or with FsError when its log cannot be written.
 * They do not retry and do not time out.
 */
export interface BuildRunner {
  run(
    options: BuildOptions,
    workingDir: string,
    logFile: string,
    goals: readonly string[]
  ): Promise<void>;
}

/**
 * Error thrown when a build invocation fails.
 */
export class BuildExecutionError extends Error {
  constructor(
    message: string,
    public readonly goals: readonly string[],
    public readonly workingDir: string,
    public readonly logFile: string,
    public readonly exitCode: number | null,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'BuildExecutionError';
  }
}

/**
 * Builds the argv passed to the Maven executable.
 *
 * @example
 * ```typescript
 * buildMavenArgs({ command: 'mvn', args: [] }, { skipTests: 'true' }, ['clean'])
 * // Returns: ['--show-version', '--batch-mode', '-DskipTests=true', 'clean']
 * ```
 */
export function buildMavenArgs(
  config: MavenConfig,
  options: BuildOptions,
  goals: readonly string[]
): string[] {
  const args = ['--show-version', '--batch-mode'];
  if (config.settings) {
    args.push('-s', config.settings);
  }
  for (const [key, value] of Object.entries(options)) {
    args.push(`-D${key}=${value}`);
  }
  args.push(...config.args, ...goals);
  return args;
}

/**
 * Runs Maven as an external process.
 */
export class ExternalMavenRunner implements BuildRunner {
  constructor(private readonly config: MavenConfig) {}

  async run(
    options: BuildOptions,
    workingDir: string,
    logFile: string,
    goals: readonly string[]
  ): Promise<void> {
    const args = buildMavenArgs(this.config, options, goals);
    console.log(`Running ${this.config.command} ${args.join(' ')} in ${workingDir} >> ${logFile}`);

    const log = createWriteStream(logFile, { flags: 'w' });
    // First write error on the log, whenever it happens.
    let logError: Error | null = null;
    log.on('error', (error: Error) => {
      logError ??= error;
    });
    const logOpened = new Promise<void>((resolve, reject) => {
      log.once('open', () => resolve());
      log.once('error', reject);
    });

    try {
      await logOpened;
    } catch (error) {
      throw new BuildExecutionError(
        `Unable to open build log ${logFile}: ${error instanceof Error ? error.message : String(error)}`,
        goals,
        workingDir,
        logFile,
        null,
        error instanceof Error ? error : undefined
      );
    }

    const exitCode = await new Promise<number | null>((resolve, reject) => {
      const child = spawn(this.config.command, args, {
        cwd: workingDir,
        shell: false,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      child.stdout?.pipe(log, { end: false });
      child.stderr?.pipe(log, { end: false });

      child.on('error', reject);
      child.on('close', (code: number | null) => resolve(code));
    }).catch((error: unknown) => {
      log.end();
      throw new BuildExecutionError(
        `Failed to start ${this.config.command}: ${error instanceof Error ? error.message : String(error)}`,
        goals,
        workingDir,
        logFile,
        null,
        error instanceof Error ? error : undefined
      );
    });

    log.end();
    try {
      await finished(log);
    } catch (error) {
      logError ??= error instanceof Error ? error : new Error(String(error));
    }
    if (logError) {
      throw new FsError(
        `Failed to write build log ${logFile}: ${logError.message}`,
        logFile,
        logError
      );
    }

    if (exitCode !== 0) {
      throw new BuildExecutionError(
        `Build ${goals.join(' ')} failed in ${workingDir} with exit code ${exitCode ?? 'null'}; see ${logFile}`,
        goals,
        workingDir,
        logFile,
        exitCode
      );
    }
  }
}
