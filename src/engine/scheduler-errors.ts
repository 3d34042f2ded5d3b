export class MissingCostModelError extends Error {
  constructor(public readonly target?: string) {
    super(
      target
        ? `Target ${target} has no cost model; cannot schedule`
        : "No target cost model bound; cannot schedule",
    );
    this.name = "MissingCostModelError";
  }
}

/**
 * The degree map and the graph disagree: a consumer was never counted, or
 * was released more times than it has inputs.
 */
export class DegreeMapDesyncError extends Error {
  constructor(
    public readonly nodeId: number,
    reason: string,
  ) {
    super(`Degree map out of sync at %n${nodeId}: ${reason}`);
    this.name = "DegreeMapDesyncError";
  }
}

export class EmptyLedgerError extends Error {
  name = "EmptyLedgerError";
  constructor() {
    super("advance() called with no active resource users");
  }
}

export class InvalidOperatorCostError extends Error {
  constructor(
    public readonly nodeId: number,
    public readonly cost: number,
  ) {
    super(`Operator %n${nodeId} has invalid cycle cost ${cost}`);
    this.name = "InvalidOperatorCostError";
  }
}

export class MissingPassError extends Error {
  constructor(
    public readonly passId: string,
    public readonly requiredBy: string,
  ) {
    super(`Pass ${requiredBy} requires ${passId}, which is not registered`);
    this.name = "MissingPassError";
  }
}

export class PassDependencyCycleError extends Error {
  constructor(public readonly passId: string) {
    super(`Pass dependency cycle through ${passId}`);
    this.name = "PassDependencyCycleError";
  }
}
