import type { Graph, IRValue } from "./graph";

function formatValue(value: IRValue): string {
  const shape = value.shape ? `[${value.shape.join(",")}]` : "";
  const dtype = value.dtype ?? "";
  const meta = shape || dtype ? `:${dtype}${shape}` : "";
  return `%${value.name}${meta}`;
}

/**
 * Render a graph one node per line, in graph order.
 *
 *   graph(%1:f32[1,3])
 *     %n2 %2:f32[1,3] = Relu(%1)
 *     return(%2)
 */
export function dumpGraph(graph: Graph): string {
  const lines: string[] = [];
  lines.push(`graph(${graph.inputs().map(formatValue).join(", ")})`);
  for (const node of graph.nodes()) {
    const outs = node.outputs.map((id) => formatValue(graph.value(id))).join(", ");
    const ins = node.inputs.map((id) => `%${graph.value(id).name}`).join(", ");
    const lhs = outs ? `${outs} = ` : "";
    lines.push(`  %n${node.id} ${lhs}${node.kind}(${ins})`);
  }
  const rets = graph.outputs().map((value) => `%${value.name}`).join(", ");
  lines.push(`  return(${rets})`);
  return lines.join("\n");
}
