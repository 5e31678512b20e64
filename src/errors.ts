// ============================================================================
// Error Codes
// ============================================================================

export const ErrorCodes = {
  MISSING_COLUMN: 'E101',
  INVALID_TABLE_VALUE: 'E102',
  DUPLICATE_ROW: 'E103',
  PLOT_SPANS_RANGES: 'E104',
  INVALID_CONFIG: 'E150',
  DEGENERATE_FRAME: 'E201',
  EMPTY_LAYOUT: 'E301',
  INVALID_BUFFER: 'E401',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export type ErrorPhase = 'config' | 'layout' | 'frame' | 'assemble' | 'buffer' | 'validate';

// ============================================================================
// Base Error
// ============================================================================

export class PlotLayoutError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly phase: ErrorPhase,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PlotLayoutError';
  }
}

// ============================================================================
// Layout Grid Errors
// ============================================================================

export class MissingColumnError extends PlotLayoutError {
  constructor(public readonly missing: string[]) {
    super(`Table is missing required column(s): ${missing.join(', ')}`, ErrorCodes.MISSING_COLUMN, 'layout', {
      missing,
    });
    this.name = 'MissingColumnError';
  }
}

export class DuplicateRowError extends PlotLayoutError {
  constructor(
    public readonly plot: number,
    public readonly row: number
  ) {
    super(`Plot ${plot} lists Row ${row} more than once`, ErrorCodes.DUPLICATE_ROW, 'layout', { plot, row });
    this.name = 'DuplicateRowError';
  }
}

export class InvalidTableError extends PlotLayoutError {
  constructor(message: string, code: ErrorCode = ErrorCodes.INVALID_TABLE_VALUE, details?: Record<string, unknown>) {
    super(message, code, 'layout', details);
    this.name = 'InvalidTableError';
  }
}

export class ConfigurationError extends PlotLayoutError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.INVALID_CONFIG, 'config', details);
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Geometry Errors
// ============================================================================

export class DegenerateFrameError extends PlotLayoutError {
  constructor(public readonly length: number) {
    super(
      `Points A and B are ${length} apart; the AB line needs a non-zero length`,
      ErrorCodes.DEGENERATE_FRAME,
      'frame',
      { length }
    );
    this.name = 'DegenerateFrameError';
  }
}

export class EmptyLayoutError extends PlotLayoutError {
  constructor() {
    super('Layout contains no plots', ErrorCodes.EMPTY_LAYOUT, 'assemble');
    this.name = 'EmptyLayoutError';
  }
}

export type BufferAxis = 'row' | 'range';

export class InvalidBufferError extends PlotLayoutError {
  constructor(
    public readonly key: string,
    public readonly plot: number,
    public readonly axis: BufferAxis,
    public readonly extent: number,
    public readonly buffer: number
  ) {
    const reason =
      buffer < 0
        ? `${axis} buffer ${buffer} is negative`
        : `${axis} buffer ${buffer} on both sides leaves nothing of the ${extent} ${axis} extent`;
    super(`Plot ${plot} (${key}): ${reason}`, ErrorCodes.INVALID_BUFFER, 'buffer', {
      key,
      plot,
      axis,
      extent,
      buffer,
    });
    this.name = 'InvalidBufferError';
  }
}
