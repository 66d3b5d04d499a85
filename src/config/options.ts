/**
 * Agent options and their validation. Everything here runs once, at agent construction;
 * the engines only ever see a ResolvedOptions.
 */

import fs from 'fs';

import { MockableConfigError } from '../errors';
import {
  isMode,
  isUnrecognizedPolicy,
  type IgnoreHeaders,
  type Logger,
  type MockableMode,
  type MockableModeName,
  type Transport,
  type UnrecognizedPolicy,
} from '../types/schema';

/** Environment variables read by mode `env`. */
export const ENV_MODE = 'MOCKABLE_MODE';
export const ENV_FILE = 'MOCKABLE_FILE';

export interface MockableOptions {
  /** Defaults to 'passthrough'. 'env' reads MOCKABLE_MODE and MOCKABLE_FILE. */
  mode?: MockableModeName | string;
  /** Recording to write (record) or read (playback). */
  file?: string;
  /** Defaults to 'exception'. */
  unrecognized?: UnrecognizedPolicy | string;
  /** Extra request headers left out of playback comparison, or 'all'. */
  ignoreHeaders?: IgnoreHeaders;
  ignoreBody?: boolean;
  /** Sends real requests. Defaults to the global fetch as it is when the agent is built. */
  transport?: Transport;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

export type ResolvedOptions =
  | { mode: 'passthrough'; file?: string }
  | { mode: 'record'; file: string }
  | { mode: 'playback'; file: string; unrecognized: UnrecognizedPolicy; ignoreHeaders: IgnoreHeaders; ignoreBody: boolean };

function resolveMode(options: MockableOptions, env: NodeJS.ProcessEnv): { mode: MockableMode; file?: string } {
  const name = options.mode ?? 'passthrough';
  if (!isMode(name)) {
    throw new MockableConfigError(
      `Invalid mode "${name}". Must be one of 'env', 'record', 'playback', or 'passthrough'`
    );
  }
  if (name !== 'env') return { mode: name, file: options.file };

  if (options.file) {
    throw new MockableConfigError(
      `Do not specify 'file' when 'mode' is 'env'. Use the ${ENV_FILE} environment variable instead`
    );
  }
  const fromEnv = env[ENV_MODE] || 'passthrough';
  if (!isMode(fromEnv) || fromEnv === 'env') {
    throw new MockableConfigError(
      `Invalid ${ENV_MODE} "${fromEnv}". Must be one of 'record', 'playback', or 'passthrough'`
    );
  }
  return { mode: fromEnv, file: env[ENV_FILE] || undefined };
}

function validateIgnoreHeaders(value: IgnoreHeaders | undefined): IgnoreHeaders {
  if (value === undefined || value === 'all') return value ?? [];
  if (!Array.isArray(value) || !value.every((h) => typeof h === 'string' && h !== '')) {
    throw new MockableConfigError(`Invalid ignoreHeaders. Must be 'all' or a list of header names`);
  }
  return value;
}

/** Validates options and resolves mode `env`. Throws MockableConfigError on any problem. */
export function resolveOptions(options: MockableOptions, env: NodeJS.ProcessEnv = process.env): ResolvedOptions {
  const { mode, file } = resolveMode(options, env);
  const unrecognized = options.unrecognized ?? 'exception';
  if (!isUnrecognizedPolicy(unrecognized)) {
    throw new MockableConfigError(
      `Invalid unrecognized "${unrecognized}". Must be one of 'exception', 'null', or 'fallback'`
    );
  }
  const ignoreHeaders = validateIgnoreHeaders(options.ignoreHeaders);

  if (mode === 'passthrough') return { mode, file };
  if (!file) {
    throw new MockableConfigError('You must specify a recording file');
  }
  if (mode === 'record') return { mode, file };

  if (!fs.existsSync(file)) {
    throw new MockableConfigError(`Playback file ${file} not found`);
  }
  return { mode, file, unrecognized, ignoreHeaders, ignoreBody: options.ignoreBody ?? false };
}
