/**
 * Stage graph executor
 *
 * A graph is a set of named stages, each declaring the stages it depends on
 * and the state fields it writes. `defineGraph` validates the topology once;
 * the resulting graph is immutable and may be executed by any number of
 * concurrent runs.
 *
 * Execution:
 * - A stage starts once every dependency has completed and merged its update
 * - Independent stages run concurrently on the event loop
 * - Each stage sees a frozen snapshot of the state taken when it started
 * - Updates merge field by field; fields with a reducer are combined, others
 *   are overwritten, undefined values are ignored
 * - The first failure stops scheduling; in-flight stages are awaited and the
 *   original error is rethrown
 */

import { GraphDefinitionError, StageOwnershipError, errorMessage } from '../errors/index.js';
import type { Logger, Metrics } from '../logging/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

export type StateUpdate<S> = { [K in keyof S]?: S[K] };

export type Reducers<S> = { [K in keyof S]?: (current: S[K], update: S[K]) => S[K] };

/**
 * Services available to every stage of a run
 */
export interface ExecutionContext {
  logger: Logger;
  metrics: Metrics;
}

export interface StageDefinition<S, C extends ExecutionContext> {
  name: string;
  dependsOn: readonly string[];
  writes: ReadonlyArray<Extract<keyof S, string>>;
  run(state: Readonly<S>, context: C): Promise<StateUpdate<S>>;
}

export interface GraphDefinition<S, C extends ExecutionContext> {
  stages: ReadonlyArray<StageDefinition<S, C>>;
  reducers?: Reducers<S>;
}

export interface StageGraph<S, C extends ExecutionContext> {
  readonly stages: ReadonlyMap<string, StageDefinition<S, C>>;
  readonly reducers: Readonly<Reducers<S>>;
  /** A topological order of stage names */
  readonly order: readonly string[];
}

// ============================================================================
// Definition
// ============================================================================

/**
 * Validate a stage set and freeze it into a graph
 *
 * @throws GraphDefinitionError on duplicate names, unknown dependencies,
 *   cycles, or a field written by more than one stage without a reducer
 */
export function defineGraph<S, C extends ExecutionContext>(definition: GraphDefinition<S, C>): StageGraph<S, C> {
  const reducers: Reducers<S> = { ...definition.reducers };
  const stages = new Map<string, StageDefinition<S, C>>();

  for (const stage of definition.stages) {
    if (stages.has(stage.name)) {
      throw new GraphDefinitionError(`Duplicate stage name "${stage.name}"`);
    }
    stages.set(stage.name, stage);
  }

  const owners = new Map<string, string>();
  for (const stage of stages.values()) {
    for (const dependency of stage.dependsOn) {
      if (!stages.has(dependency)) {
        throw new GraphDefinitionError(`Stage "${stage.name}" depends on unknown stage "${dependency}"`);
      }
    }
    for (const field of stage.writes) {
      if (reducers[field]) continue;
      const owner = owners.get(field);
      if (owner !== undefined) {
        throw new GraphDefinitionError(`Field "${field}" is written by both "${owner}" and "${stage.name}"`);
      }
      owners.set(field, stage.name);
    }
  }

  const order = topologicalOrder(stages);

  return Object.freeze({
    stages,
    reducers: Object.freeze(reducers),
    order: Object.freeze(order),
  });
}

function topologicalOrder<S, C extends ExecutionContext>(stages: ReadonlyMap<string, StageDefinition<S, C>>): string[] {
  const remaining = new Map<string, number>();
  for (const stage of stages.values()) {
    remaining.set(stage.name, stage.dependsOn.length);
  }

  const order: string[] = [];
  const queue = [...stages.values()].filter((stage) => stage.dependsOn.length === 0).map((stage) => stage.name);

  while (queue.length > 0) {
    const name = queue.shift();
    if (name === undefined) break;
    order.push(name);
    for (const stage of stages.values()) {
      if (!stage.dependsOn.includes(name)) continue;
      const count = (remaining.get(stage.name) ?? 0) - 1;
      remaining.set(stage.name, count);
      if (count === 0) {
        queue.push(stage.name);
      }
    }
  }

  if (order.length !== stages.size) {
    const cyclic = [...stages.keys()].filter((name) => !order.includes(name));
    throw new GraphDefinitionError(`Stage graph contains a cycle through: ${cyclic.join(', ')}`);
  }
  return order;
}

// ============================================================================
// Execution
// ============================================================================

function mergeField<S, K extends keyof S>(state: S, field: K, value: S[K] | undefined, reducers: Reducers<S>): void {
  if (value === undefined) return;
  const reducer = reducers[field];
  state[field] = reducer ? reducer(state[field], value) : value;
}

function applyUpdate<S, C extends ExecutionContext>(
  state: S,
  stage: StageDefinition<S, C>,
  update: StateUpdate<S>,
  reducers: Reducers<S>
): void {
  const writable = new Set<string>(stage.writes);
  for (const key of Object.keys(update)) {
    if (!writable.has(key)) {
      throw new StageOwnershipError(stage.name, key);
    }
  }
  for (const field of stage.writes) {
    mergeField<S, typeof field>(state, field, update[field], reducers);
  }
}

/**
 * Run every stage of the graph and return the final state
 *
 * The initial state is copied; the caller's object is never mutated.
 */
export async function executeGraph<S extends object, C extends ExecutionContext>(
  graph: StageGraph<S, C>,
  initialState: S,
  context: C
): Promise<S> {
  const { logger, metrics } = context;
  const state: S = { ...initialState };
  const completed = new Set<string>();
  const started = new Set<string>();
  const running = new Map<string, Promise<string>>();
  const failures: unknown[] = [];

  const launch = (stage: StageDefinition<S, C>): void => {
    started.add(stage.name);
    const snapshot: Readonly<S> = Object.freeze({ ...state });
    const startTime = Date.now();
    logger.info('Stage started', { stage: stage.name });

    const task = (async (): Promise<string> => {
      try {
        const update = await stage.run(snapshot, context);
        applyUpdate(state, stage, update, graph.reducers);
        completed.add(stage.name);
        const duration = Date.now() - startTime;
        metrics.timing('pipeline.stage.duration', duration, { stage: stage.name });
        logger.info('Stage completed', { stage: stage.name, duration });
      } catch (error) {
        metrics.increment('pipeline.stage.errors', { stage: stage.name });
        logger.error('Stage failed', { stage: stage.name, error: errorMessage(error) });
        failures.push(error);
      }
      return stage.name;
    })();

    running.set(stage.name, task);
  };

  for (;;) {
    if (failures.length === 0) {
      for (const name of graph.order) {
        const stage = graph.stages.get(name);
        if (!stage || started.has(name)) continue;
        if (stage.dependsOn.every((dependency) => completed.has(dependency))) {
          launch(stage);
        }
      }
    }

    if (running.size === 0) break;
    const finished = await Promise.race(running.values());
    running.delete(finished);
  }

  if (failures.length > 0) {
    throw failures[0];
  }
  return state;
}
