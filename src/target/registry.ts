import type { TargetBackend } from "./cost-model";

/**
 * Named target backends. Callers own the registry and pass it where it is
 * needed; there is no process-wide instance.
 */
export class TargetRegistry {
  private targets = new Map<string, TargetBackend>();

  constructor(initial: TargetBackend[] = []) {
    for (const target of initial) {
      this.register(target);
    }
  }

  register(target: TargetBackend): void {
    this.targets.set(target.name, target);
  }

  get(name: string): TargetBackend | undefined {
    return this.targets.get(name);
  }

  use(name: string): TargetBackend {
    const target = this.targets.get(name);
    if (!target) {
      throw new Error(`Unknown target: ${name}`);
    }
    return target;
  }

  names(): string[] {
    return [...this.targets.keys()];
  }
}
