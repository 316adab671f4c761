export const ValidationErrorKinds = {
  ILLEGAL_URL: "IllegalUrl",
  ILLEGAL_IMPRESSION_AMOUNT: "IllegalImpressionAmount",
  EMPTY_CATEGORIES: "EmptyCategories",
} as const;

export type ValidationErrorKind =
  (typeof ValidationErrorKinds)[keyof typeof ValidationErrorKinds];

const VALIDATION_MESSAGES: Record<ValidationErrorKind, string> = {
  IllegalUrl: "Banner url must be a non-empty string",
  IllegalImpressionAmount: "Banner impression amount must be a positive integer",
  EmptyCategories: "Banner must have at least one category",
};

/**
 * A rejected banner record. Scoped to the one record; the store is left
 * untouched and loading carries on with the next record.
 */
export class BannerValidationError extends Error {
  public readonly kind: ValidationErrorKind;

  constructor(kind: ValidationErrorKind) {
    super(VALIDATION_MESSAGES[kind]);
    this.name = "BannerValidationError";
    this.kind = kind;
  }
}

/**
 * The append-only / frozen-after-build contract was broken. Never recovered
 * from: the service aborts.
 */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolationError";
  }
}

export const isInvariantViolation = (error: unknown): error is InvariantViolationError =>
  error instanceof InvariantViolationError;
