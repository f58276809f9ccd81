// Job router - resolves a job's selector to the one worker whose queue receives it
//
// The routing table is built once from the ordered worker list and never changes
// afterwards. Keys are worker indices, declared tags and worker names. "any" only
// ever means the replica group of worker 0: the workers sharing its name.

import { RoutingError, describeSelector, type WorkerSelector } from '@lightinfer/core';

export interface RoutableWorker {
  readonly index: number;
  readonly name: string;
  readonly tags: readonly string[];
  /** Jobs queued on the worker plus the one it is running, if any. */
  readonly load: number;
}

export class RoutingTable<W extends RoutableWorker> {
  private readonly byIndex: readonly W[];
  private readonly byTag = new Map<string, W[]>();
  private readonly replicas: readonly W[];

  constructor(workers: readonly W[]) {
    if (workers.length === 0) {
      throw new RangeError('Routing table needs at least one worker');
    }

    workers.forEach((worker, position) => {
      if (worker.index !== position) {
        throw new RangeError(`Worker ${worker.name} has index ${worker.index} but sits at position ${position}`);
      }
      for (const key of new Set([worker.name, ...worker.tags])) {
        const group = this.byTag.get(key) ?? [];
        group.push(worker);
        this.byTag.set(key, group);
      }
    });

    this.byIndex = Object.freeze([...workers]);
    this.replicas = Object.freeze(workers.filter(worker => worker.name === workers[0].name));
  }

  get size(): number {
    return this.byIndex.length;
  }

  get tags(): string[] {
    return [...this.byTag.keys()];
  }

  /** Every worker the selector allows. Throws RoutingError instead of returning an empty set. */
  resolve(selector: WorkerSelector): readonly W[] {
    switch (selector.kind) {
      case 'any':
        return this.replicas;

      case 'index': {
        const worker = Number.isInteger(selector.index) ? this.byIndex[selector.index] : undefined;
        if (!worker) {
          throw new RoutingError(
            `No worker at index ${selector.index} (pool has ${this.byIndex.length} workers)`
          );
        }
        return [worker];
      }

      case 'tag': {
        const group = this.byTag.get(selector.tag);
        if (!group || group.length === 0) {
          throw new RoutingError(`No worker is registered under tag "${selector.tag}"`);
        }
        return group;
      }
    }
  }

  /**
   * Pick the candidate with the fewest in-flight jobs, lowest index on ties.
   * Reads queue lengths only; nothing is reserved until the caller enqueues.
   */
  route(selector: WorkerSelector): W {
    const candidates = this.resolve(selector);
    let chosen = candidates[0];
    for (const candidate of candidates) {
      if (candidate.load < chosen.load || (candidate.load === chosen.load && candidate.index < chosen.index)) {
        chosen = candidate;
      }
    }

    if (!chosen) {
      throw new RoutingError(`Selector ${describeSelector(selector)} resolved to no worker`);
    }
    return chosen;
  }
}
