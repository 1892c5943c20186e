// src/command-runner.ts
import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import SemanticReleaseError from '@semantic-release/error';
import { errorMessage } from './errors.js';

export interface Logger {
  log: (m: string) => void;
  error: (m: string) => void;
}

const execFileAsync = promisify(execFile);

const stringify = (v: unknown): string => {
  if (typeof v === 'string') {
    return v;
  } else {
    if (Buffer.isBuffer(v)) {
      return v.toString('utf8');
    } else {
      return '';
    }
  }
};

/**
 * Read a captured stream (stdout or stderr) off an error thrown by
 * execFile. Missing or non-text values read as an empty string.
 */
function captured(err: unknown, key: 'stdout' | 'stderr'): string {
  if (typeof err !== 'object' || err === null) {
    return '';
  }
  return stringify(Reflect.get(err, key));
}

/**
 * Render a command and its argv as a single line for logs and errors.
 */
export function formatCommand(cmd: string, args: string[]): string {
  return [cmd, ...args].join(' ');
}

/**
 * Execute a host command without a shell and return its trimmed combined
 * output (stdout followed by stderr). The command line is logged before it
 * runs, and its output (or "(no output)") after.
 *
 * On failure the function logs the failing command and any captured output,
 * then rejects with a SemanticReleaseError coded `ECOMMANDFAILED` whose
 * message carries the command, its arguments, the underlying error and the
 * output text. The output alone is kept in `details`.
 *
 * @param cmd Executable to run, resolved through PATH.
 * @param args Argument vector, passed verbatim.
 * @param logger Logger for the command echo and its output.
 * @param signal Aborts the child process when fired.
 * @returns Trimmed combined output of the command.
 */
export async function runHostCmd(
  cmd: string,
  args: string[],
  logger: Logger,
  signal?: AbortSignal,
): Promise<string> {
  const line = formatCommand(cmd, args);
  logger.log(`$ ${line}`);

  try {
    const { stdout, stderr } = await execFileAsync(cmd, args, {
      encoding: 'utf8',
      signal,
    });
    const trimmed = `${stdout}${stderr}`.trim();

    if (trimmed.length > 0) {
      logger.log(trimmed);
    } else {
      logger.log('(no output)');
    }

    return trimmed;
  } catch (err: unknown) {
    logger.error(`Command failed: ${line}`);

    const output =
      `${captured(err, 'stdout')}${captured(err, 'stderr')}`.trim();
    if (output.length > 0) {
      logger.error(output);
    }

    throw new SemanticReleaseError(
      `${line}: ${errorMessage(err)}: ${output}`,
      'ECOMMANDFAILED',
      output,
    );
  }
}
