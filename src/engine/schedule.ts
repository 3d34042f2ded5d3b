import type { NodeId } from "../ir/graph";
import type { NodeKind } from "../ir/kinds";
import type { BoundaryResult } from "./boundary";

export interface ScheduleEntry {
  node: NodeId;
  kind: NodeKind;
  resource: string;
  /** Position in overall admission order. */
  admissionIndex: number;
  round: number;
  startCycle: number;
  endCycle: number;
  cycles: number;
}

export interface ScheduleRound {
  index: number;
  startCycle: number;
  admitted: NodeId[];
  /** Cycles until the first release after this round's admissions. */
  elapsedCycles: number;
  released: NodeId[];
}

export interface Schedule {
  rounds: ScheduleRound[];
  entries: ScheduleEntry[];
  /** Node ids in admission order. */
  order: NodeId[];
  makespan: number;
  /** Tracked nodes whose dependencies were never all satisfied. */
  unscheduled: NodeId[];
  /** Ready nodes that could never be admitted (zero-capacity resources). */
  stalled: NodeId[];
  boundary: BoundaryResult;
}

/**
 * Entries that occupy a unit of `resource` at `cycle` (start inclusive, end
 * exclusive). Zero-cycle entries never occupy anything.
 */
export function activeAt(
  entries: ScheduleEntry[],
  resource: string,
  cycle: number,
): ScheduleEntry[] {
  return entries.filter(
    (entry) =>
      entry.resource === resource &&
      entry.startCycle <= cycle &&
      cycle < entry.endCycle,
  );
}

const COLUMNS = ["round", "start", "end", "cycles", "resource", "node"] as const;
const NUMERIC_COLUMNS = 4;

/**
 * Fixed-width table of the schedule in admission order.
 */
export function formatSchedule(schedule: Schedule): string {
  const rows: string[][] = [COLUMNS.slice()];
  for (const entry of schedule.entries) {
    rows.push([
      String(entry.round),
      String(entry.startCycle),
      String(entry.endCycle),
      String(entry.cycles),
      entry.resource,
      `${entry.kind} %n${entry.node}`,
    ]);
  }
  const widths = COLUMNS.map((_, col) =>
    Math.max(...rows.map((row) => row[col].length)),
  );
  const lines = rows.map((row) =>
    row
      .map((cell, col) =>
        col < NUMERIC_COLUMNS ? cell.padStart(widths[col]) : cell.padEnd(widths[col]),
      )
      .join("  ")
      .trimEnd(),
  );
  lines.push(`makespan: ${schedule.makespan} cycles`);
  return lines.join("\n");
}
