/**
 * Transform backed by an external encoder binary
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import type { MediaCacheConfig } from './config.js';
import { ValidationError } from './errors.js';
import type { Transform, TransformRequest, TransformResult } from './types.js';

const execFileAsync = promisify(execFile);

/** Output kept from a single encoder run */
const MAX_BUFFER = 50 * 1024 * 1024;

export interface CommandOptions {
  timeoutMs?: number;
  cwd?: string;
  signal?: AbortSignal;
}

export interface CreateCommandTransformParams {
  /** Executable name or path */
  binary: string;
  /** Arguments for one request, including input and output paths */
  buildArgs: (request: TransformRequest) => string[];
  timeoutMs?: number;
  cwd?: string;
}

function readOutput(err: object, key: 'stdout' | 'stderr'): string {
  if (!(key in err)) return '';
  const value: unknown = Reflect.get(err, key);
  return typeof value === 'string' ? value : '';
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

function joinLog(stderr: string, stdout: string): string {
  return [stderr, stdout].filter((part) => part.length > 0).join('\n');
}

/**
 * Run a binary to completion.
 * A non-zero exit or a timeout is reported as `success: false`; cancellation rejects.
 */
export async function runCommand(
  binary: string,
  args: readonly string[],
  options: CommandOptions = {}
): Promise<TransformResult> {
  try {
    const { stdout, stderr } = await execFileAsync(binary, args, {
      encoding: 'utf8',
      maxBuffer: MAX_BUFFER,
      ...(options.timeoutMs !== undefined ? { timeout: options.timeoutMs } : {}),
      ...(options.cwd !== undefined ? { cwd: options.cwd } : {}),
      ...(options.signal !== undefined ? { signal: options.signal } : {}),
    });
    return { success: true, log: joinLog(stderr, stdout) };
  } catch (err) {
    if (isAbortError(err) || !(err instanceof Error)) throw err;
    const log = joinLog(readOutput(err, 'stderr'), readOutput(err, 'stdout'));
    return { success: false, log: log || err.message };
  }
}

export function createCommandTransform(params: CreateCommandTransformParams): Transform {
  const { binary, buildArgs, timeoutMs, cwd } = params;
  return (request) =>
    runCommand(binary, buildArgs(request), {
      ...(timeoutMs !== undefined ? { timeoutMs } : {}),
      ...(cwd !== undefined ? { cwd } : {}),
      ...(request.signal ? { signal: request.signal } : {}),
    });
}

const PLACEHOLDER = /\{(output|input\d*)\}/g;

/**
 * Fill `{input}`, `{input0}`, `{input1}` ... and `{output}` in an argument template
 */
export function expandArgs(template: readonly string[], request: TransformRequest): string[] {
  return template.map((arg) =>
    arg.replace(PLACEHOLDER, (_match, name: string) => {
      if (name === 'output') return request.outputPath;
      const index = name === 'input' ? 0 : Number(name.slice('input'.length));
      const inputPath = request.inputPaths[index];
      if (inputPath === undefined) {
        throw new ValidationError('args', `{${name}} has no matching input (got ${request.inputPaths.length})`);
      }
      return inputPath;
    })
  );
}

/**
 * Transform that runs the configured encoder with a placeholder argument template
 */
export function createEncoderTransform(
  config: Pick<MediaCacheConfig, 'encoderPath' | 'encoderTimeoutMs'>,
  template: readonly string[]
): Transform {
  return createCommandTransform({
    binary: config.encoderPath,
    buildArgs: (request) => expandArgs(template, request),
    timeoutMs: config.encoderTimeoutMs,
  });
}
