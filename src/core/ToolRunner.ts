import { ProcessUtils, ProcessOptions, ProcessResult } from '../utils/ProcessUtils';
import { ToolExecutionError } from '../utils/Errors';
import { logger } from '../utils/Logger';

export interface ToolRunOptions extends ProcessOptions {
  /** Label used when echoing the captured streams */
  label?: string;
  /** Echo stdout/stderr after the process ends, whatever the outcome */
  echo?: boolean;
}

/**
 * Run an external program and insist on exit code zero.
 */
export async function runTool(
  command: string,
  args: string[],
  options: ToolRunOptions = {}
): Promise<ProcessResult> {
  const { label, echo, ...processOptions } = options;
  const display = ProcessUtils.formatCommand(command, args);
  logger.debug(`Running ${display}`);

  let result: ProcessResult;
  try {
    result = await ProcessUtils.execute(command, args, processOptions);
  } catch (error) {
    throw new ToolExecutionError(
      display,
      {
        exitCode: null,
        reason: error instanceof Error ? error.message : 'spawn failed',
      },
      error
    );
  }

  if (echo) {
    const name = label ?? command;
    logger.output(`${name} stdout`, result.stdout);
    logger.output(`${name} stderr`, result.stderr);
  }

  if (result.terminated) {
    throw new ToolExecutionError(display, {
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
      reason: result.terminated === 'timeout' ? `timed out after ${options.timeout}ms` : 'aborted',
    });
  }

  if (result.exitCode !== 0) {
    throw new ToolExecutionError(display, {
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
    });
  }

  return result;
}
