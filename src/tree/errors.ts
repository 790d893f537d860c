export class FilterError extends Error {
  constructor(
    public readonly pattern: string,
    reason: string
  ) {
    super(`Invalid filter /${pattern}/: ${reason}`);
    this.name = 'FilterError';
  }
}

export class MutationError extends Error {
  constructor(
    public readonly operation: string,
    cause: unknown
  ) {
    super(`Cannot ${operation}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'MutationError';
  }
}

export class SelectionOutOfRangeError extends Error {
  constructor(
    public readonly index: number,
    public readonly length: number
  ) {
    super(`Selection ${index} outside 0..${length - 1}`);
    this.name = 'SelectionOutOfRangeError';
  }
}
