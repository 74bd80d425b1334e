/**
 * Micro-DAG Executor
 *
 * Validates and runs a named set of stages against a declared linear order.
 * The order is a total order over every node: no branching, no skipping,
 * no parallel stages. Each processor is awaited before the next one starts.
 */

import type { DagNodes, PipelineContext } from "./types.js";

export type DagViolationKind =
  | 'name_mismatch'
  | 'missing_nodes'
  | 'duplicate_nodes'
  | 'unscheduled_nodes'
  | 'dependency_order';

export class DagValidationError extends Error {
  readonly kind: DagViolationKind;
  readonly violations: string[];

  constructor(kind: DagViolationKind, violations: string[], message: string) {
    super(message);
    this.name = 'DagValidationError';
    this.kind = kind;
    this.violations = violations;
  }
}

/**
 * Validate DAG structure against an execution order.
 *
 * Checks run in sequence; the first failing check throws with every
 * offending name from that check.
 */
export function validateDag(nodes: DagNodes, order: readonly string[]): void {
  const mismatched = Object.entries(nodes)
    .filter(([key, node]) => node.name !== key)
    .map(([key, node]) => `${key} (${node.name})`);
  if (mismatched.length > 0) {
    throw new DagValidationError(
      'name_mismatch',
      mismatched,
      `DAG node names do not match their keys: ${mismatched.join(', ')}`,
    );
  }

  const missing = order.filter((name) => !Object.hasOwn(nodes, name));
  if (missing.length > 0) {
    throw new DagValidationError(
      'missing_nodes',
      missing,
      `Execution order references missing nodes: ${missing.join(', ')}`,
    );
  }

  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const name of order) {
    if (seen.has(name)) duplicates.add(name);
    seen.add(name);
  }
  if (duplicates.size > 0) {
    const repeated = [...duplicates];
    throw new DagValidationError(
      'duplicate_nodes',
      repeated,
      `Execution order lists nodes more than once: ${repeated.join(', ')}`,
    );
  }

  const scheduled = new Set(order);
  const unscheduled = Object.keys(nodes).filter((name) => !scheduled.has(name));
  if (unscheduled.length > 0) {
    throw new DagValidationError(
      'unscheduled_nodes',
      unscheduled,
      `DAG nodes not scheduled in execution order: ${unscheduled.join(', ')}`,
    );
  }

  const position = new Map<string, number>();
  order.forEach((name, idx) => position.set(name, idx));

  const violations: string[] = [];
  for (const [name, node] of Object.entries(nodes)) {
    const own = position.get(name) ?? -1;
    for (const dep of node.dependencies) {
      const depPos = position.get(dep);
      if (depPos === undefined || depPos >= own) {
        violations.push(`${dep} -> ${name}`);
      }
    }
  }
  if (violations.length > 0) {
    throw new DagValidationError(
      'dependency_order',
      violations,
      `Dependency order violation: ${violations.join(', ')}`,
    );
  }
}

export interface ExecuteDagOptions {
  /** Record per-node timings under context.telemetry (default true). */
  telemetry?: boolean;
}

function roundMs(ms: number): number {
  return Math.round(ms * 1000) / 1000;
}

/**
 * Validate, then run every node in order, threading the context through.
 * Per-node wall-clock time lands in `context.telemetry.nodes[name].ms`.
 */
export async function executeDag(
  nodes: DagNodes,
  order: readonly string[],
  input: string,
  context: PipelineContext,
  options: ExecuteDagOptions = {},
): Promise<PipelineContext> {
  validateDag(nodes, order);

  const recordTimings = options.telemetry ?? true;
  let current = context;

  for (const name of order) {
    const node = nodes[name];
    const start = performance.now();
    current = await node.processor(input, current);
    if (recordTimings) {
      const telemetry = current.telemetry ?? { nodes: {} };
      telemetry.nodes[name] = { ms: roundMs(performance.now() - start) };
      current.telemetry = telemetry;
    }
  }

  return current;
}
