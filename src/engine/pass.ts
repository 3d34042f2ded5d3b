import { createLogger, type Logger } from "../core/logger";
import type { Graph } from "../ir/graph";
import { MissingPassError, PassDependencyCycleError } from "./scheduler-errors";

export type PassResult = "failure" | "no_change" | "changed";

export interface CompileModule {
  name: string;
  graph: Graph;
}

export interface PassContext {
  logger: Logger;
}

export interface Pass {
  readonly id: string;
  /** Ids of passes that must have run on the module first. */
  readonly requires?: readonly string[];
  run(module: CompileModule, context: PassContext): PassResult;
}

export type PassRecord = {
  id: string;
  result: PassResult;
};

export type PipelineReport = {
  status: PassResult;
  passes: PassRecord[];
};

/**
 * An ordered list of passes plus the analyses they may require.
 *
 * Built by the caller; passes are never looked up in a global table.
 * Required passes run before their dependents, at most once per run.
 */
export class PassPipeline {
  private scheduled: Pass[] = [];
  private available = new Map<string, Pass>();
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? createLogger("pipeline");
  }

  /** Append a pass to the pipeline. */
  add(pass: Pass): this {
    this.scheduled.push(pass);
    this.available.set(pass.id, pass);
    return this;
  }

  /** Make a pass available to satisfy `requires` without scheduling it. */
  register(pass: Pass): this {
    this.available.set(pass.id, pass);
    return this;
  }

  passIds(): string[] {
    return this.scheduled.map((pass) => pass.id);
  }

  run(module: CompileModule): PipelineReport {
    for (const pass of this.scheduled) {
      this.checkRequirements(pass, new Set());
    }

    const context: PassContext = { logger: this.logger };
    const done = new Map<string, PassResult>();
    const records: PassRecord[] = [];

    const runPass = (pass: Pass): PassResult => {
      const previous = done.get(pass.id);
      if (previous !== undefined) {
        return previous;
      }
      for (const id of pass.requires ?? []) {
        const required = this.lookup(id, pass.id);
        if (runPass(required) === "failure") {
          return "failure";
        }
      }
      this.logger.debug(`running ${pass.id} on ${module.name}`);
      const result = pass.run(module, context);
      done.set(pass.id, result);
      records.push({ id: pass.id, result });
      return result;
    };

    for (const pass of this.scheduled) {
      if (runPass(pass) === "failure") {
        this.logger.error(`${pass.id} failed on ${module.name}`);
        return { status: "failure", passes: records };
      }
    }
    const changed = records.some((record) => record.result === "changed");
    return { status: changed ? "changed" : "no_change", passes: records };
  }

  private lookup(id: string, requiredBy: string): Pass {
    const pass = this.available.get(id);
    if (!pass) {
      throw new MissingPassError(id, requiredBy);
    }
    return pass;
  }

  private checkRequirements(pass: Pass, visiting: Set<string>): void {
    if (visiting.has(pass.id)) {
      throw new PassDependencyCycleError(pass.id);
    }
    visiting.add(pass.id);
    for (const id of pass.requires ?? []) {
      this.checkRequirements(this.lookup(id, pass.id), visiting);
    }
    visiting.delete(pass.id);
  }
}
