// ── Error Types ──

/** Base class for toolbar gesture errors */
export class ToolbarGestureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolbarGestureError';
  }
}

/** Thrown when a callback arrives in a state that cannot accept it */
export class GestureStateError extends ToolbarGestureError {
  constructor(
    message: string,
    readonly state: string,
  ) {
    super(message);
    this.name = 'GestureStateError';
  }
}

/** Thrown for invalid gesture configuration values */
export class GestureConfigError extends ToolbarGestureError {
  constructor(
    message: string,
    readonly key: string,
  ) {
    super(message);
    this.name = 'GestureConfigError';
  }
}
