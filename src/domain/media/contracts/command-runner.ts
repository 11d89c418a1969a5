export interface CommandInvocation {
  readonly command: string;
  readonly args: readonly string[];
}

export interface CommandResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

/**
 * Runs an external binary to completion.
 *
 * Implementations reject with `media.backend-unavailable` when the binary
 * cannot be found and with `media.execution-failed` on a non-zero exit; the
 * captured output travels in the error metadata.
 */
export interface CommandRunner {
  run(invocation: CommandInvocation): Promise<CommandResult>;
}

export function formatInvocation(invocation: CommandInvocation): string {
  return [invocation.command, ...invocation.args].join(' ');
}
