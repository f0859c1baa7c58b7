// errors.ts
// Lineage failures, each with a code hosts can switch on

export type LineageErrorCode =
  | "UNRESOLVED_PLAN"
  | "CYCLIC_DEFINITION"
  | "UNSUPPORTED_OPERATOR"
  | "INVALID_PLAN";

export class LineageError extends Error {
  public readonly code: LineageErrorCode;

  constructor(message: string, code: LineageErrorCode) {
    super(message);
    this.name = "LineageError";
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The plan still carries references the resolver never bound. */
export class UnresolvedPlanError extends LineageError {
  public readonly reference: string;

  constructor(reference: string, message: string = `Unresolved reference: ${reference}`) {
    super(message, "UNRESOLVED_PLAN");
    this.name = "UnresolvedPlanError";
    this.reference = reference;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A view, cache or CTE reached itself while being inlined. */
export class CyclicDefinitionError extends LineageError {
  public readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`Cyclic definition: ${cycle.join(" -> ")}`, "CYCLIC_DEFINITION");
    this.name = "CyclicDefinitionError";
    this.cycle = cycle;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Reported (not thrown) when the propagator meets an operator it has no rule
 * for and falls back to positional passthrough.
 */
export class UnsupportedOperatorError extends LineageError {
  public readonly operator: string;

  constructor(operator: string) {
    super(`No lineage rule for operator ${operator}; using passthrough`, "UNSUPPORTED_OPERATOR");
    this.name = "UnsupportedOperatorError";
    this.operator = operator;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidPlanError extends LineageError {
  constructor(message: string = "Invalid plan") {
    super(message, "INVALID_PLAN");
    this.name = "InvalidPlanError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
