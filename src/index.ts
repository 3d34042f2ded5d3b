export { resolveSchedulerConfig, type SchedulerConfig } from "./config";
export { createLogger, type Logger, type LogLevel, silentLogger } from "./core/logger";
export { computeBufferSize, type DType } from "./core/shape";
export { dumpGraph } from "./ir/dump";
export {
  Graph,
  type IRNode,
  type IRValue,
  type NodeAttrs,
  type NodeId,
  type NodeOptions,
  type Use,
  type ValueId,
  type ValueMeta,
} from "./ir/graph";
export { InvalidGraphEditError, UnknownNodeError, UnknownValueError } from "./ir/ir-errors";
export * from "./ir/kinds";
export { type BoundaryResult, hasBoundaryNodes, normalizeBoundary } from "./engine/boundary";
export {
  computeGraphOutputSizes,
  GRAPH_OUTPUT_SIZE_PASS_ID,
  GraphOutputSizeAnalysis,
  type GraphOutputSizes,
  isElementwise,
  propagateElementwiseMetadata,
} from "./engine/graph-output-size";
export {
  type Admission,
  greedyPickNextNodes,
  type ListSchedulerOptions,
  scheduleGraph,
  type SchedulerState,
} from "./engine/list-scheduler";
export { emittedOrder, NODE_SCHEDULER_PASS_ID, NodeSchedulerPass } from "./engine/node-scheduler-pass";
export {
  type CompileModule,
  type Pass,
  type PassContext,
  PassPipeline,
  type PassResult,
  type PipelineReport,
} from "./engine/pass";
export { buildDegreeMap, DegreeMap } from "./engine/readiness";
export { type AdvanceResult, ResourceLedger, type ResourceUser } from "./engine/resource-ledger";
export {
  activeAt,
  formatSchedule,
  type Schedule,
  type ScheduleEntry,
  type ScheduleRound,
} from "./engine/schedule";
export * from "./engine/scheduler-errors";
export {
  type CostMetric,
  type CostModel,
  createResource,
  type ExecutionResource,
  type TargetBackend,
} from "./target/cost-model";
export { createReferenceTarget, REFERENCE_TARGET_NAME } from "./target/reference-target";
export { TargetRegistry } from "./target/registry";
export { type CostEntry, type CostTable, TableCostModel, UnknownOperatorError } from "./target/table-cost-model";
