import { spawn } from 'node:child_process';

import {
  formatInvocation,
  MediaErrors,
  type CommandInvocation,
  type CommandResult,
  type CommandRunner,
} from '../../domain/media/index.js';
import { createChildLogger, type Logger } from '../../shared/logger/pino.js';

/**
 * Spawns binaries without a shell and buffers both streams so a failure can
 * report exactly what the tool printed.
 */
export class SpawnCommandRunner implements CommandRunner {
  private readonly logger: Logger;

  public constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? createChildLogger({ module: 'SpawnCommandRunner' });
  }

  public async run(invocation: CommandInvocation): Promise<CommandResult> {
    const commandLine = formatInvocation(invocation);
    this.logger.info({ command: commandLine }, 'Running command');

    const result = await new Promise<CommandResult>((resolve, reject) => {
      const proc = spawn(invocation.command, [...invocation.args], {
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      proc.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      proc.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      proc.on('error', (error) => {
        if ('code' in error && error.code === 'ENOENT') {
          reject(MediaErrors.backendUnavailable(invocation, error));
          return;
        }
        reject(
          MediaErrors.executionFailed(`Failed to start ${invocation.command}`, { command: commandLine }, error),
        );
      });

      proc.on('close', (code) => {
        resolve({
          exitCode: code ?? -1,
          stdout: Buffer.concat(stdout).toString('utf8'),
          stderr: Buffer.concat(stderr).toString('utf8'),
        });
      });
    });

    if (result.exitCode !== 0) {
      this.logger.error({ command: commandLine, exitCode: result.exitCode, stderr: result.stderr }, 'Command failed');
      throw MediaErrors.executionFailed(`${invocation.command} exited with code ${result.exitCode}`, {
        command: commandLine,
        exitCode: result.exitCode,
        stdout: result.stdout,
        stderr: result.stderr,
      });
    }

    this.logger.debug({ command: commandLine, stdout: result.stdout, stderr: result.stderr }, 'Command output');
    return result;
  }
}
