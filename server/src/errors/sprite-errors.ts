/**
 * Error taxonomy for the sprite pipeline
 *
 * `transient` marks failures worth one automatic retry (collaborator
 * timeouts, network drops, upstream 5xx).
 */
export type SpriteErrorCode =
  | 'CONFIG_ERROR'
  | 'GRID_DETECTION_ERROR'
  | 'REMOVAL_ERROR'
  | 'GENERATION_ERROR'
  | 'NO_SPRITES_FOUND'
  | 'PACKAGING_ERROR'
  | 'INTERNAL_ERROR';

export class SpriteServiceError extends Error {
  readonly code: SpriteErrorCode;
  readonly transient: boolean;

  constructor(code: SpriteErrorCode, message: string, transient = false) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.transient = transient;
  }
}

export class ConfigError extends SpriteServiceError {
  /** Dotted path of the offending parameter, when known */
  readonly field?: string;

  constructor(message: string, field?: string) {
    super('CONFIG_ERROR', message);
    this.field = field;
  }
}

export class GridDetectionError extends SpriteServiceError {
  constructor(message = 'No grid separator lines detected; retry with explicit rows and cols') {
    super('GRID_DETECTION_ERROR', message);
  }
}

export class RemovalError extends SpriteServiceError {
  constructor(message: string, transient = false) {
    super('REMOVAL_ERROR', message, transient);
  }
}

export class GenerationError extends SpriteServiceError {
  constructor(message: string, transient = false) {
    super('GENERATION_ERROR', message, transient);
  }
}

export class NoSpritesFoundError extends SpriteServiceError {
  constructor(message = 'No sprites found') {
    super('NO_SPRITES_FOUND', message);
  }
}

export class PackagingError extends SpriteServiceError {
  constructor(message: string) {
    super('PACKAGING_ERROR', message);
  }
}

/**
 * Normalize anything thrown inside a task into a SpriteServiceError
 */
export function classifyError(error: unknown): SpriteServiceError {
  if (error instanceof SpriteServiceError) {
    return error;
  }
  return new SpriteServiceError('INTERNAL_ERROR', errorMessage(error) || 'Unknown error in sprite pipeline');
}

/**
 * Rebuild a typed error from its serialized parts, e.g. after it crossed a thread boundary
 */
export function reviveError(
  code: SpriteErrorCode,
  message: string,
  transient: boolean,
  field?: string
): SpriteServiceError {
  switch (code) {
    case 'CONFIG_ERROR':
      return new ConfigError(message, field);
    case 'GRID_DETECTION_ERROR':
      return new GridDetectionError(message);
    case 'REMOVAL_ERROR':
      return new RemovalError(message, transient);
    case 'GENERATION_ERROR':
      return new GenerationError(message, transient);
    case 'NO_SPRITES_FOUND':
      return new NoSpritesFoundError(message);
    case 'PACKAGING_ERROR':
      return new PackagingError(message);
    default:
      return new SpriteServiceError(code, message, transient);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
