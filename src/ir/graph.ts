import type { DType } from "../core/shape";
import { InvalidGraphEditError, UnknownNodeError, UnknownValueError } from "./ir-errors";
import { type NodeKind, RETURN_KIND } from "./kinds";

// ============================================================================
// Core Types
// ============================================================================

export type NodeId = number;
export type ValueId = number;

export type NodeAttrs = Record<string, number | string | number[]>;

export type ValueMeta = {
  name?: string;
  shape?: number[];
  dtype?: DType;
};

/**
 * One consumer slot: `user.inputs[index]` is the value.
 */
export interface Use {
  user: NodeId;
  index: number;
}

export interface IRValue {
  id: ValueId;
  name: string;
  /** null for external inputs and for values whose producer was removed */
  producer: NodeId | null;
  uses: Use[];
  shape?: number[];
  dtype?: DType;
}

export interface IRNode {
  id: NodeId;
  /** Position in graph order; renumbered on every structural edit. */
  order: number;
  kind: NodeKind;
  inputs: ValueId[];
  outputs: ValueId[];
  attrs: NodeAttrs;
}

export type NodeOptions = {
  numOutputs?: number;
  /** Metadata for outputs, matched by index. */
  outputMeta?: ValueMeta[];
  attrs?: NodeAttrs;
};

// ============================================================================
// Graph
// ============================================================================

/**
 * Arena-backed dataflow graph.
 *
 * Nodes and values are addressed by numeric ids; producer and consumer links
 * are id lookups, so a removed entity is detected on access instead of being
 * silently followed. The `return` sentinel is held outside the node order and
 * compares after every ordered node; its inputs are the graph outputs.
 */
export class Graph {
  private nodeArena = new Map<NodeId, IRNode>();
  private valueArena = new Map<ValueId, IRValue>();
  private nodeOrder: NodeId[] = [];
  private graphInputs: ValueId[] = [];
  private nextNodeId = 1;
  private nextValueId = 1;

  readonly returnNode: IRNode;

  /** Set once Load/Store boundary nodes have been inserted. */
  boundaryNormalized = false;

  constructor() {
    this.returnNode = this.createNode(RETURN_KIND, [], {});
    this.returnNode.order = Number.POSITIVE_INFINITY;
  }

  // --------------------------------------------------------------------------
  // Lookup
  // --------------------------------------------------------------------------

  node(id: NodeId): IRNode {
    const node = this.nodeArena.get(id);
    if (!node) {
      throw new UnknownNodeError(id);
    }
    return node;
  }

  value(id: ValueId): IRValue {
    const value = this.valueArena.get(id);
    if (!value) {
      throw new UnknownValueError(id);
    }
    return value;
  }

  hasNode(id: NodeId): boolean {
    return this.nodeArena.has(id);
  }

  /**
   * Ordered nodes, excluding the `return` sentinel.
   */
  nodes(): IRNode[] {
    return this.nodeOrder.map((id) => this.node(id));
  }

  get size(): number {
    return this.nodeOrder.length;
  }

  lastNode(): IRNode | undefined {
    const id = this.nodeOrder[this.nodeOrder.length - 1];
    return id === undefined ? undefined : this.node(id);
  }

  inputs(): IRValue[] {
    return this.graphInputs.map((id) => this.value(id));
  }

  outputs(): IRValue[] {
    return this.returnNode.inputs.map((id) => this.value(id));
  }

  isBefore(a: NodeId, b: NodeId): boolean {
    return this.node(a).order < this.node(b).order;
  }

  /** The single output of a node; throws if it has none or several. */
  output(nodeId: NodeId): IRValue {
    const node = this.node(nodeId);
    if (node.outputs.length !== 1) {
      throw new InvalidGraphEditError(
        `${node.kind} %n${nodeId} has ${node.outputs.length} outputs, expected 1`,
      );
    }
    return this.value(node.outputs[0]);
  }

  // --------------------------------------------------------------------------
  // Construction
  // --------------------------------------------------------------------------

  addInput(meta: ValueMeta = {}): ValueId {
    const value = this.createValue(null, meta);
    this.graphInputs.push(value.id);
    return value.id;
  }

  /**
   * A value with no producer that is not a graph input. Consumers of such a
   * value see a dangling reference.
   */
  addUnboundValue(meta: ValueMeta = {}): ValueId {
    return this.createValue(null, meta).id;
  }

  appendNode(kind: NodeKind, inputs: ValueId[], options: NodeOptions = {}): NodeId {
    const node = this.createNode(kind, inputs, options);
    this.nodeOrder.push(node.id);
    node.order = this.nodeOrder.length - 1;
    return node.id;
  }

  /**
   * Insert a new node immediately before `anchor`. Inserting before the
   * `return` sentinel appends.
   */
  insertNodeBefore(
    anchor: NodeId,
    kind: NodeKind,
    inputs: ValueId[],
    options: NodeOptions = {},
  ): NodeId {
    const anchorNode = this.node(anchor);
    if (anchorNode === this.returnNode) {
      return this.appendNode(kind, inputs, options);
    }
    const node = this.createNode(kind, inputs, options);
    this.nodeOrder.splice(anchorNode.order, 0, node.id);
    this.renumberFrom(anchorNode.order);
    return node.id;
  }

  markOutput(valueId: ValueId): void {
    const value = this.value(valueId);
    value.uses.push({
      user: this.returnNode.id,
      index: this.returnNode.inputs.length,
    });
    this.returnNode.inputs.push(valueId);
  }

  // --------------------------------------------------------------------------
  // Mutation
  // --------------------------------------------------------------------------

  /**
   * Rebind every use of `from` (graph-output uses included) to `to`.
   */
  replaceAllUsesWith(from: ValueId, to: ValueId): void {
    if (from === to) {
      return;
    }
    const source = this.value(from);
    const target = this.value(to);
    for (const use of source.uses) {
      this.node(use.user).inputs[use.index] = to;
      target.uses.push(use);
    }
    source.uses = [];
  }

  copyMetadata(from: ValueId, to: ValueId): void {
    const source = this.value(from);
    const target = this.value(to);
    target.shape = source.shape?.slice();
    target.dtype = source.dtype;
  }

  /**
   * Remove a node. Its uses are detached from its inputs; its outputs stay
   * in the arena with no producer, so remaining consumers see them dangle.
   */
  removeNode(id: NodeId): void {
    const node = this.node(id);
    if (node === this.returnNode) {
      throw new InvalidGraphEditError("cannot remove the return sentinel");
    }
    node.inputs.forEach((valueId, index) => {
      const value = this.value(valueId);
      value.uses = value.uses.filter(
        (use) => !(use.user === id && use.index === index),
      );
    });
    for (const valueId of node.outputs) {
      this.value(valueId).producer = null;
    }
    this.nodeOrder.splice(node.order, 1);
    this.nodeArena.delete(id);
    this.renumberFrom(node.order);
  }

  /**
   * Replace node order with a permutation of the current nodes.
   * Returns true if the order changed.
   */
  reorder(ids: NodeId[]): boolean {
    if (ids.length !== this.nodeOrder.length) {
      throw new InvalidGraphEditError(
        `reorder expects ${this.nodeOrder.length} nodes, got ${ids.length}`,
      );
    }
    const seen = new Set<NodeId>();
    for (const id of ids) {
      const node = this.node(id);
      if (node === this.returnNode || seen.has(id)) {
        throw new InvalidGraphEditError(`reorder is not a permutation (node %n${id})`);
      }
      seen.add(id);
    }
    const changed = ids.some((id, i) => this.nodeOrder[i] !== id);
    this.nodeOrder = ids.slice();
    this.renumberFrom(0);
    return changed;
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private createValue(producer: NodeId | null, meta: ValueMeta): IRValue {
    const id = this.nextValueId++;
    const value: IRValue = {
      id,
      name: meta.name ?? String(id),
      producer,
      uses: [],
      shape: meta.shape?.slice(),
      dtype: meta.dtype,
    };
    this.valueArena.set(id, value);
    return value;
  }

  private createNode(kind: NodeKind, inputs: ValueId[], options: NodeOptions): IRNode {
    for (const valueId of inputs) {
      this.value(valueId);
    }
    const numOutputs = options.numOutputs ?? (kind === RETURN_KIND ? 0 : 1);
    const node: IRNode = {
      id: this.nextNodeId++,
      order: -1,
      kind,
      inputs: inputs.slice(),
      outputs: [],
      attrs: { ...options.attrs },
    };
    this.nodeArena.set(node.id, node);
    inputs.forEach((valueId, index) => {
      this.value(valueId).uses.push({ user: node.id, index });
    });
    for (let i = 0; i < numOutputs; i++) {
      node.outputs.push(this.createValue(node.id, options.outputMeta?.[i] ?? {}).id);
    }
    return node;
  }

  private renumberFrom(start: number): void {
    for (let i = start; i < this.nodeOrder.length; i++) {
      this.node(this.nodeOrder[i]).order = i;
    }
  }
}
