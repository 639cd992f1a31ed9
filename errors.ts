export class InvalidArgumentError extends Error {
  constructor(public readonly argument: string, reason = "is required") {
    super(`${argument} ${reason}`);
    this.name = "InvalidArgumentError";
  }
}

export class EntriesFileError extends Error {
  constructor(public readonly path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = "EntriesFileError";
  }
}
