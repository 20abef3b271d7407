/**
 * Raised when the calling layer breaks the input contract of the grading or
 * resolution core. Degraded or unresolvable input never raises this.
 */
export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContractViolationError';
  }
}
