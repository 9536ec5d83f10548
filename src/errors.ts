export class SequenceDocumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SequenceDocumentError";
  }
}

export class ResultParseError extends Error {
  constructor(
    message: string,
    readonly line: string,
  ) {
    super(message);
    this.name = "ResultParseError";
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}
