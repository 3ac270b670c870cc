export type EstimationErrorKind = 'InvalidInput' | 'DivisionByZero' | 'UndefinedROI' | 'UndefinedPayback';

export class EstimationError extends Error {
  constructor(
    public readonly kind: EstimationErrorKind,
    public readonly field: string,
    message: string,
  ) {
    super(message);
    this.name = 'EstimationError';
  }
}

export const isEstimationError = (error: unknown): error is EstimationError => error instanceof EstimationError;
