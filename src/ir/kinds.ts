export type NodeKind = string;

/** Placeholder for absent optional values. Never scheduled. */
export const UNDEFINED_KIND = "undefined";

/** Terminal sentinel whose inputs are the graph outputs. Never scheduled. */
export const RETURN_KIND = "return";

export const LOAD_KIND = "Load";
export const STORE_KIND = "Store";

export function isSentinelKind(kind: NodeKind): boolean {
  return kind === UNDEFINED_KIND || kind === RETURN_KIND;
}
