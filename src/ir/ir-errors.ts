export class UnknownNodeError extends Error {
  constructor(public readonly nodeId: number) {
    super(`Unknown or removed node %n${nodeId}`);
    this.name = "UnknownNodeError";
  }
}

export class UnknownValueError extends Error {
  constructor(public readonly valueId: number) {
    super(`Unknown value %${valueId}`);
    this.name = "UnknownValueError";
  }
}

export class InvalidGraphEditError extends Error {
  name = "InvalidGraphEditError";
}
