/**
 * Config loader for .mockable/config.yml. Read synchronously so an agent can be built
 * from it at test-file load time.
 *
 * ```yaml
 * mode: playback
 * file: ./recordings/users.json
 * unrecognized: null
 * ignoreHeaders: [x-request-id]
 * ignoreBody: false
 * ```
 */

import fs from 'fs';
import path from 'path';
import { parse } from 'yaml';

import { MockableConfigError } from '../errors';
import type { IgnoreHeaders } from '../types/schema';
import type { MockableOptions } from './options';

export const DEFAULT_CONFIG_PATH = './.mockable/config.yml';

type ConfigKey = 'mode' | 'file' | 'unrecognized' | 'ignoreHeaders' | 'ignoreBody';

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads and caches the YAML config. Exposes the parsed document via get() and the agent
 * options it describes via toOptions(). Accepts optional configPath for testing.
 */
export class ConfigManager {
  private readonly cfg: Record<string, unknown>;
  private readonly configPath: string;

  constructor(configPath: string = DEFAULT_CONFIG_PATH) {
    this.configPath = configPath;
    const raw = fs.readFileSync(configPath, 'utf8');
    const parsed: unknown = parse(raw);
    if (parsed == null) {
      this.cfg = {};
    } else if (isMapping(parsed)) {
      this.cfg = parsed;
    } else {
      throw new MockableConfigError(`Config file ${configPath} must contain a mapping`);
    }
  }

  /** Returns the parsed config object. */
  get(): Record<string, unknown> {
    return this.cfg;
  }

  /**
   * Agent options from the config. A relative `file` is resolved against the directory
   * holding the config file. Values are checked by the agent, not here.
   */
  toOptions(): MockableOptions {
    const options: MockableOptions = {};
    const mode = this.optionalString('mode');
    if (mode !== undefined) options.mode = mode;
    const file = this.optionalString('file');
    if (file !== undefined) options.file = path.resolve(path.dirname(this.configPath), file);
    const unrecognized = this.optionalString('unrecognized');
    if (unrecognized !== undefined) options.unrecognized = unrecognized;
    const ignoreHeaders = this.ignoreHeaders();
    if (ignoreHeaders !== undefined) options.ignoreHeaders = ignoreHeaders;
    const ignoreBody = this.cfg.ignoreBody;
    if (ignoreBody !== undefined) {
      if (typeof ignoreBody !== 'boolean') throw this.invalid('ignoreBody', 'a boolean');
      options.ignoreBody = ignoreBody;
    }
    return options;
  }

  private optionalString(key: ConfigKey): string | undefined {
    const value = this.cfg[key];
    if (value === undefined) return undefined;
    // YAML reads a bare `null` policy as the null value.
    if (value === null && key === 'unrecognized') return 'null';
    if (typeof value !== 'string') throw this.invalid(key, 'a string');
    return value;
  }

  private ignoreHeaders(): IgnoreHeaders | undefined {
    const value = this.cfg.ignoreHeaders;
    if (value === undefined || value === 'all') return value;
    if (Array.isArray(value) && value.every((h): h is string => typeof h === 'string')) return value;
    throw this.invalid('ignoreHeaders', "'all' or a list of header names");
  }

  private invalid(key: ConfigKey, expected: string): MockableConfigError {
    return new MockableConfigError(`Config file ${this.configPath}: "${key}" must be ${expected}`);
  }
}
