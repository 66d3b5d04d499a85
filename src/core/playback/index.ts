export {
  PlaybackEngine,
  diagnosticsFor,
  type MatchDiagnostics,
  type PlaybackEngineOptions,
  type PlaybackOutcome,
  type PlaybackState,
} from './playback-engine';
export { LocalResponder, LOCAL_RESPONDER_ORIGIN } from './local-responder';
