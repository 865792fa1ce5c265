import { UndefinedVariableError } from "../errors.js";
import type { Value } from "../notation/values.js";

export type FrameKind = "global" | "task" | "node";

interface Frame {
  kind: FrameKind;
  values: Map<string, Value>;
}

/**
 * Chain of variable frames, innermost last. Child scopes share their
 * ancestors' frames by reference, so a write promoted to the task frame is
 * visible to every node of that task.
 *
 * Write rules:
 *   - a name already bound in the task frame is written there;
 *   - anything else goes to the innermost frame;
 *   - the global frame is only written when it is the innermost frame.
 */
export class VariableScope {
  private constructor(private readonly frames: readonly Frame[]) {}

  static root(globals: Record<string, Value> = {}): VariableScope {
    return new VariableScope([{ kind: "global", values: toMap(globals) }]);
  }

  /** Open the task frame for one page visit. */
  task(bindings: Record<string, Value> = {}): VariableScope {
    return this.push("task", bindings);
  }

  /** Open a node-local frame. */
  child(bindings: Record<string, Value> = {}): VariableScope {
    return this.push("node", bindings);
  }

  has(name: string): boolean {
    return this.findFrame(name) !== undefined;
  }

  get(name: string): Value | undefined {
    return this.findFrame(name)?.values.get(name);
  }

  lookup(name: string): Value {
    const frame = this.findFrame(name);
    if (!frame) throw new UndefinedVariableError(name);
    return frame.values.get(name) ?? null;
  }

  set(name: string, value: Value): void {
    const task = this.frames.find((f) => f.kind === "task");
    if (task?.values.has(name)) {
      task.values.set(name, value);
      return;
    }
    this.frames[this.frames.length - 1].values.set(name, value);
  }

  /** Flattened view, inner frames shadowing outer ones. */
  snapshot(): Record<string, Value> {
    const out: Record<string, Value> = {};
    for (const frame of this.frames) {
      for (const [k, v] of frame.values) out[k] = v;
    }
    return out;
  }

  get depth(): number {
    return this.frames.length;
  }

  private push(kind: FrameKind, bindings: Record<string, Value>): VariableScope {
    return new VariableScope([...this.frames, { kind, values: toMap(bindings) }]);
  }

  private findFrame(name: string): Frame | undefined {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      if (this.frames[i].values.has(name)) return this.frames[i];
    }
    return undefined;
  }
}

function toMap(bindings: Record<string, Value>): Map<string, Value> {
  return new Map(Object.entries(bindings));
}
