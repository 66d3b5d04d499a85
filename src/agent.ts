/**
 * MockableAgent: an HTTP client that records, plays back, or passes through.
 *
 * The mode is fixed at construction. Record mode keeps every transaction in memory
 * and writes them on save() or close(); playback mode loads the recording eagerly and
 * answers requests from it in order. Callers own the agent's lifetime: close() it
 * (or use withMockable) so a recording is always flushed.
 */

import fs from 'fs';
import path from 'path';

import { ConfigManager } from './config/config-manager';
import { resolveOptions, type MockableOptions, type ResolvedOptions } from './config/options';
import { HOP_BY_HOP_REQUEST_HEADERS, toHeaders, withHeaders } from './core/http/headers';
import { requestBody, snapshotRequest } from './core/http/snapshot';
import { PlaybackEngine } from './core/playback/playback-engine';
import { RecordEngine } from './core/record/record-engine';
import { TransactionStore } from './core/store/transaction-store';
import { setupMockableInterceptor, type MockableInterceptor } from './interceptors/http';
import { retrieve, store } from './store/recording-file';
import type { Logger, MockableMode, RecordedRequest, Transaction, Transport } from './types/schema';

type ModeState =
  | { mode: 'passthrough' }
  | { mode: 'record'; file: string; store: TransactionStore; engine: RecordEngine }
  | { mode: 'playback'; file: string; store: TransactionStore; engine: PlaybackEngine };

function defaultTransport(): Transport {
  const original = globalThis.fetch;
  return (request) => original(request);
}

/**
 * The request to send for real, rebuilt from its snapshot. Requests handed over by the
 * interceptor can carry connection headers from http.request (transfer-encoding,
 * connection) that fetch rejects; those are left out here but kept in the snapshot.
 */
function liveRequest(original: Request, snapshot: RecordedRequest): Request {
  return new Request(snapshot.url, {
    method: snapshot.method,
    headers: toHeaders(snapshot.headers, HOP_BY_HOP_REQUEST_HEADERS),
    body: requestBody(snapshot.method, snapshot.body),
    redirect: original.redirect,
    signal: original.signal,
  });
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class MockableAgent {
  private readonly state: ModeState;
  private readonly transport: Transport;
  private readonly logger: Logger;
  private interceptor: MockableInterceptor | undefined;
  private closed = false;

  /** @throws MockableConfigError for invalid options or a missing playback file. */
  constructor(options: MockableOptions = {}) {
    const resolved = resolveOptions(options, options.env ?? process.env);
    this.transport = options.transport ?? defaultTransport();
    this.logger = options.logger ?? console;
    this.state = this.init(resolved);
  }

  /** Builds an agent from a YAML config file; `overrides` win over the file. */
  static fromConfig(configPath?: string, overrides: MockableOptions = {}): MockableAgent {
    const fromFile = new ConfigManager(configPath).toOptions();
    return new MockableAgent({ ...fromFile, ...overrides });
  }

  private init(resolved: ResolvedOptions): ModeState {
    switch (resolved.mode) {
      case 'passthrough':
        return { mode: 'passthrough' };
      case 'record': {
        const txStore = new TransactionStore();
        return { mode: 'record', file: resolved.file, store: txStore, engine: new RecordEngine(txStore, this.logger) };
      }
      case 'playback': {
        const txStore = new TransactionStore(retrieve(resolved.file));
        const engine = new PlaybackEngine(txStore, {
          unrecognized: resolved.unrecognized,
          ignoreHeaders: resolved.ignoreHeaders,
          ignoreBody: resolved.ignoreBody,
        });
        return { mode: 'playback', file: resolved.file, store: txStore, engine };
      }
    }
  }

  get mode(): MockableMode {
    return this.state.mode;
  }

  get file(): string | undefined {
    return this.state.mode === 'passthrough' ? undefined : this.state.file;
  }

  /** Recorded so far (record) or still expected (playback). Empty in passthrough. */
  get transactions(): readonly Transaction[] {
    return this.state.mode === 'passthrough' ? [] : this.state.store.snapshot();
  }

  /** Playback engine, for diagnostics such as lastResult. Undefined outside playback. */
  get playback(): PlaybackEngine | undefined {
    return this.state.mode === 'playback' ? this.state.engine : undefined;
  }

  /** fetch-compatible entry point. */
  fetch(input: string | URL | Request, init?: RequestInit): Promise<Response> {
    return this.dispatch(new Request(input, init));
  }

  /**
   * Runs one request through the active mode.
   * @throws UnrecognizedRequestError in playback with policy `exception` when it does not match.
   */
  async dispatch(request: Request): Promise<Response> {
    const state = this.state;
    switch (state.mode) {
      case 'passthrough':
        return this.transport(request);
      case 'record': {
        const recorded = await snapshotRequest(request);
        const response = await this.transport(liveRequest(request, recorded));
        return state.engine.capture(recorded, response);
      }
      case 'playback': {
        const incoming = await snapshotRequest(request);
        const outcome = state.engine.play(incoming);
        if (outcome.kind !== 'fallback') return outcome.response;
        const response = await this.transport(liveRequest(request, incoming));
        return withHeaders(response, outcome.diagnostics);
      }
    }
  }

  /**
   * Routes every http/https/fetch request of the process through this agent until
   * close(). Does nothing in passthrough mode.
   */
  intercept(): MockableInterceptor | undefined {
    if (this.state.mode === 'passthrough') return undefined;
    this.interceptor ??= setupMockableInterceptor(this);
    return this.interceptor;
  }

  /**
   * Writes the transactions recorded so far to `file` (default: the configured file).
   * Outside record mode this only logs a warning.
   */
  save(file?: string): void {
    const state = this.state;
    if (state.mode !== 'record') {
      this.logger.warn('[Mockable] save() only works in record mode');
      return;
    }
    store(file ?? state.file, state.store.snapshot());
  }

  /**
   * Ends the session: removes the interceptor and, in record mode, waits for pending
   * captures and writes the recording. Write problems are logged, never thrown.
   * Calling it again does nothing.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.interceptor?.dispose();
    this.interceptor = undefined;

    const state = this.state;
    if (state.mode !== 'record') return;
    await state.engine.settled();
    this.flush(state.file);
  }

  private flush(file: string): void {
    let dir = path.parse(file).dir;
    if (!dir) {
      this.logger.warn('[Mockable] Using current working directory');
      dir = '.';
    }
    if (!fs.existsSync(dir)) {
      this.logger.warn(`[Mockable] Cannot write output file: directory "${dir}" does not exist`);
    }
    try {
      this.save(file);
    } catch (err) {
      this.logger.warn(`[Mockable] Failed to write recording ${file}: ${errorMessage(err)}`);
    }
  }
}

/** Runs `fn` with a new agent and closes the agent on every exit path. */
export async function withMockable<T>(
  options: MockableOptions,
  fn: (agent: MockableAgent) => T | Promise<T>
): Promise<T> {
  const agent = new MockableAgent(options);
  try {
    return await fn(agent);
  } finally {
    await agent.close();
  }
}
