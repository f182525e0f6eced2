export type SpotifyTaggerErrorKind =
  | "invalid-reference"
  | "remote-service"
  | "unsupported-format"
  | "tag-encoding"
  | "configuration";

/**
 * Base class for every error this package throws on purpose.
 * `kind` lets callers branch on bad input, remote failure and local encoding failure
 * without `instanceof` chains.
 */
export abstract class SpotifyTaggerError extends Error {
  abstract readonly kind: SpotifyTaggerErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed URI/URL, unknown host or an unusable path shape. */
export class InvalidReferenceError extends SpotifyTaggerError {
  readonly kind = "invalid-reference";

  constructor(readonly input: string, reason: string) {
    super(`Invalid Spotify reference "${input}": ${reason}`);
  }
}

export class RemoteServiceError extends SpotifyTaggerError {
  readonly kind = "remote-service";

  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class UnsupportedFormatError extends SpotifyTaggerError {
  readonly kind = "unsupported-format";

  constructor(readonly format: string) {
    super(`Unsupported audio format: '${format}'`);
  }
}

export class TagEncodingError extends SpotifyTaggerError {
  readonly kind = "tag-encoding";
}

export class ConfigurationError extends SpotifyTaggerError {
  readonly kind = "configuration";
}

export function isSpotifyTaggerError(error: unknown): error is SpotifyTaggerError {
  return error instanceof SpotifyTaggerError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
