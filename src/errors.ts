export class ElaborationError extends Error {
  public code: string;

  constructor(message: string) {
    super(message);
    this.name = "ElaborationError";
    this.code = "ELABORATION_ERROR";
  }
}

/** Unbalanced enter/exit, a close while an inner scope is open, or registration with no open scope. */
export class ScopeViolation extends ElaborationError {
  constructor(message: string) {
    super(message);
    this.name = "ScopeViolation";
    this.code = "SCOPE_VIOLATION";
  }
}

/** A container closed twice, or instantiated while instantiating/done. */
export class DoubleApplicationError extends ElaborationError {
  constructor(message: string) {
    super(message);
    this.name = "DoubleApplicationError";
    this.code = "DOUBLE_APPLICATION";
  }
}

export class ConnectionDirectionError extends ElaborationError {
  constructor(message: string) {
    super(message);
    this.name = "ConnectionDirectionError";
    this.code = "CONNECTION_DIRECTION";
  }
}

/** An instantiation-only value read before the owning container produced it. */
export class PrematureAccessError extends ElaborationError {
  constructor(message: string) {
    super(message);
    this.name = "PrematureAccessError";
    this.code = "PREMATURE_ACCESS";
  }
}

export class InvariantViolation extends ElaborationError {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolation";
    this.code = "INVARIANT_VIOLATION";
  }
}

export class UnresolvedBoundaryError extends ElaborationError {
  public ends: string[];

  constructor(message: string, ends: string[]) {
    super(message);
    this.name = "UnresolvedBoundaryError";
    this.code = "UNRESOLVED_BOUNDARY";
    this.ends = ends;
  }
}

export class DesignError extends ElaborationError {
  constructor(message: string) {
    super(message);
    this.name = "DesignError";
    this.code = "DESIGN_ERROR";
  }
}

export function invariant(cond: boolean, msg: string): asserts cond {
  if (!cond) throw new InvariantViolation(msg);
}
