export class ModelError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ModelError';
  }
}

export class OutlineFileError extends Error {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(`${filePath}: ${message}`);
    this.name = 'OutlineFileError';
  }
}
