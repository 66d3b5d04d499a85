export { MockableAgent, withMockable } from './agent';
export { ConfigManager, DEFAULT_CONFIG_PATH, ENV_FILE, ENV_MODE, resolveOptions } from './config';
export type { MockableOptions, ResolvedOptions } from './config';
export { RequestComparator } from './core/compare';
export type { RequestComparatorOptions } from './core/compare';
export { TransactionStore } from './core/store';
export { PlaybackEngine, LocalResponder, LOCAL_RESPONDER_ORIGIN, diagnosticsFor } from './core/playback';
export type { MatchDiagnostics, PlaybackEngineOptions, PlaybackOutcome, PlaybackState } from './core/playback';
export { RecordEngine } from './core/record';
export {
  DEFAULT_IGNORED_HEADERS,
  DIAGNOSTIC_HEADER_PREFIX,
  HEADER_ERROR,
  HEADER_MATCH_EXCEPTION,
  HEADER_REGENERATED,
  HEADER_REQUEST_RECOGNIZED,
} from './core/http';
export { setupMockableInterceptor } from './interceptors/http';
export type { MockableInterceptor, RequestDispatcher } from './interceptors/http';
export { retrieve, store } from './store/recording-file';
export { MockableError, MockableConfigError, RecordingFormatError, UnrecognizedRequestError } from './errors';
export * from './types/schema';
