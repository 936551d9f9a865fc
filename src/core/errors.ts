/**
 * Error hierarchy.
 *
 * - FormatError: the input document cannot be read (fatal)
 * - ServiceError: a completion call failed or replied with something unusable
 * - ConfigError: bad command line or style file (fatal, before any work)
 */

export abstract class ManuscriptError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class FormatError extends ManuscriptError {
  readonly code = "ERR_FORMAT";
}

export class ServiceError extends ManuscriptError {
  readonly code = "ERR_SERVICE";
}

export class ConfigError extends ManuscriptError {
  readonly code = "ERR_CONFIG";
}
