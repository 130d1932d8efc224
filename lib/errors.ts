export type ServiceErrorCode =
  | "CORPUS_EXHAUSTED"
  | "SELECTION_CONFLICT"
  | "SELECTION_NOT_FOUND"
  | "EMPTY_CORPUS"
  | "INVALID_CORPUS";

export class ServiceError extends Error {
  status: number;
  code?: ServiceErrorCode;

  constructor(message: string, status = 400, code?: ServiceErrorCode) {
    super(message);
    this.name = "ServiceError";
    this.status = status;
    this.code = code;
  }
}

/** Every verse in the corpus has already been selected for some date. */
export class CorpusExhaustedError extends ServiceError {
  constructor(date: string) {
    super(
      `All verses have been used; no verse left for ${date}. Reset the selection history or extend the corpus.`,
      409,
      "CORPUS_EXHAUSTED",
    );
    this.name = "CorpusExhaustedError";
  }
}

export class SelectionConflictError extends ServiceError {
  date: string;

  constructor(date: string) {
    super(`A verse is already selected for ${date}`, 409, "SELECTION_CONFLICT");
    this.name = "SelectionConflictError";
    this.date = date;
  }
}

export class SelectionNotFoundError extends ServiceError {
  constructor(date: string) {
    super(`No verse has been selected for ${date}`, 404, "SELECTION_NOT_FOUND");
    this.name = "SelectionNotFoundError";
  }
}

export class EmptyCorpusError extends ServiceError {
  constructor() {
    super("No verses loaded", 503, "EMPTY_CORPUS");
    this.name = "EmptyCorpusError";
  }
}

export class CorpusLoadError extends ServiceError {
  issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 422, "INVALID_CORPUS");
    this.name = "CorpusLoadError";
    this.issues = issues;
  }
}
