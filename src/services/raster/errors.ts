export type RasterErrorCode =
  | 'EMPTY_INPUT'
  | 'INVALID_SIZING'
  | 'INVALID_COLOR_FORMAT'
  | 'INVALID_BORDER'
  | 'RENDER_FAILURE'
  | 'SVG_NOT_FOUND';

export abstract class RasterError extends Error {
  abstract readonly code: RasterErrorCode;
  readonly status: number = 400;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class EmptyInputError extends RasterError {
  readonly code = 'EMPTY_INPUT';

  constructor() {
    super('SVG input is empty');
  }
}

export class InvalidSizingError extends RasterError {
  readonly code = 'INVALID_SIZING';

  constructor(message = 'Provide a positive width or a positive scale') {
    super(message);
  }
}

export class InvalidColorFormatError extends RasterError {
  readonly code = 'INVALID_COLOR_FORMAT';

  constructor(
    readonly fieldName: string,
    readonly value: string
  ) {
    super(`${fieldName} must be '#RRGGBB', 'transparent' or 'none' (got '${value}')`);
  }
}

export class InvalidBorderError extends RasterError {
  readonly code = 'INVALID_BORDER';

  constructor(width: number) {
    super(`Border width must be a non-negative integer (got ${width})`);
  }
}

/** Wraps whatever the vector renderer threw; the original error stays on `cause`. */
export class RenderFailureError extends RasterError {
  readonly code = 'RENDER_FAILURE';
  override readonly status = 422;

  constructor(cause: unknown) {
    super(`SVG render failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export class SvgNotFoundError extends RasterError {
  readonly code = 'SVG_NOT_FOUND';
  override readonly status = 404;

  constructor(name: string) {
    super(`Invalid SVG file: ${name}`);
  }
}
