/** Codes carried by engine errors */
export type DiffEngineErrorCode = 'MALFORMED_INPUT';

/**
 * Raised when input bytes cannot be decoded as UTF-8 text.
 *
 * Alignment itself is total over any two finite sequences, so this is the
 * only error the engine raises.
 */
export class MalformedInputError extends Error {
  public readonly code: DiffEngineErrorCode = 'MALFORMED_INPUT';
  public readonly identifier: string;

  constructor(identifier: string, message: string) {
    super(message);
    this.name = 'MalformedInputError';
    this.identifier = identifier;
  }
}
