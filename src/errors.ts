import type { ComparisonResult } from './types/schema';

export class MockableError extends Error {
  constructor(message: string) {
    super(`[Mockable] ${message}`);
    this.name = new.target.name;
  }
}

/** Invalid agent options. Always thrown at construction. */
export class MockableConfigError extends MockableError {}

/** Playback request that did not match the next recorded transaction (policy `exception`). */
export class UnrecognizedRequestError extends MockableError {
  readonly result: Extract<ComparisonResult, { matched: false }>;

  constructor(result: Extract<ComparisonResult, { matched: false }>) {
    super(`Unrecognized request: ${result.explanation}`);
    this.result = result;
  }
}

/** Recording file that is not a JSON array of transactions. */
export class RecordingFormatError extends MockableError {
  readonly file: string;

  constructor(file: string, detail: string) {
    super(`Invalid recording file ${file}: ${detail}`);
    this.file = file;
  }
}
