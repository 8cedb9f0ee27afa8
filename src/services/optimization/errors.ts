/**
 * Input errors raised before any model is built.
 *
 * Solver outcomes (time limit, infeasible) are never thrown; they are
 * reported on the result with an OptimizationErrorCategory.
 */

export type InputErrorCategory = 'shape' | 'domain';

export class AssignmentInputError extends Error {
  readonly category: InputErrorCategory;

  constructor(category: InputErrorCategory, message: string) {
    super(message);
    this.name = 'AssignmentInputError';
    this.category = category;
  }
}

/**
 * Dimensions or indices don't line up: matrix sizes, student counts per
 * week, option indices out of range, holes in the student list.
 */
export class InputShapeError extends AssignmentInputError {
  constructor(message: string) {
    super('shape', message);
    this.name = 'InputShapeError';
  }
}

/**
 * Values outside their domain: non-positive preferences in a regular week,
 * non-finite numbers, negative weights, asymmetric partner matrix.
 */
export class InputDomainError extends AssignmentInputError {
  constructor(message: string) {
    super('domain', message);
    this.name = 'InputDomainError';
  }
}
