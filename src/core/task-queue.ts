/**
 * Task Queue
 *
 * Sole owner of task state until a task is terminal. Every transition goes
 * through compareAndSet, so two workers can never both move the same task
 * to IN_FLIGHT. Dispatch order is earliest-eligible-first, ties broken by
 * enqueue order, which keeps every eligible task reachable.
 */

import type { ErrorKind, Payload, Stage, Task, TaskSeed, TaskStatus } from '../types/task.js';
import { isTerminal } from '../types/task.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('task-queue');

export type TaskListener = (task: Readonly<Task>) => void;

export interface StageStatusCounts {
  total: number;
  pending: number;
  inFlight: number;
  retryable: number;
  succeeded: number;
  failedPermanent: number;
}

interface Entry {
  task: Task;
  seq: number;
}

const DISPATCHABLE: readonly TaskStatus[] = ['PENDING', 'FAILED_RETRYABLE'];

export class TaskQueue {
  private readonly entries = new Map<string, Entry>();
  private readonly listeners = new Set<TaskListener>();
  private readonly settleWaiters = new Map<Stage, Array<() => void>>();
  private changeWaiters: Array<() => void> = [];
  private seq = 0;
  private halted = false;

  enqueue(seed: TaskSeed): Task {
    if (this.halted) {
      throw new Error(`Queue is halted; refusing ${seed.stage} task for ${seed.target}`);
    }

    this.seq++;
    const task: Task = {
      id: `${seed.stage.toLowerCase()}-${this.seq}`,
      stage: seed.stage,
      target: seed.target,
      endpointClass: seed.endpointClass,
      attempts: 0,
      nextEligibleAt: seed.notBefore ?? 0,
      status: 'PENDING',
      page: seed.page ?? 1,
      parentId: seed.parentId
    };

    this.entries.set(task.id, { task, seq: this.seq });
    log.debug(`Enqueued ${task.id} ${task.target}`);
    this.notifyChange();
    return task;
  }

  get(id: string): Readonly<Task> | undefined {
    return this.entries.get(id)?.task;
  }

  /**
   * Claim the earliest eligible task, moving it to IN_FLIGHT.
   */
  dequeueEligible(now: number): Task | null {
    if (this.halted) return null;

    let best: Entry | null = null;
    for (const entry of this.entries.values()) {
      const { task } = entry;
      if (!DISPATCHABLE.includes(task.status) || task.nextEligibleAt > now) continue;
      if (
        !best ||
        task.nextEligibleAt < best.task.nextEligibleAt ||
        (task.nextEligibleAt === best.task.nextEligibleAt && entry.seq < best.seq)
      ) {
        best = entry;
      }
    }

    if (!best) return null;
    return this.compareAndSet(best.task.id, DISPATCHABLE, 'IN_FLIGHT') ? best.task : null;
  }

  /**
   * Earliest time a task becomes dispatchable, or null if nothing is waiting.
   */
  nextEligibleAt(): number | null {
    if (this.halted) return null;

    let earliest: number | null = null;
    for (const { task } of this.entries.values()) {
      if (!DISPATCHABLE.includes(task.status)) continue;
      if (earliest === null || task.nextEligibleAt < earliest) {
        earliest = task.nextEligibleAt;
      }
    }
    return earliest;
  }

  /**
   * Atomically move a task from one of `expected` to `next`.
   * Returns false, changing nothing, when the task is in any other state.
   */
  compareAndSet(id: string, expected: readonly TaskStatus[], next: TaskStatus): boolean {
    const entry = this.entries.get(id);
    if (!entry || !expected.includes(entry.task.status)) {
      return false;
    }

    entry.task.status = next;
    if (isTerminal(next)) {
      this.onTerminal(entry.task);
    }
    return true;
  }

  /** Count one attempt against an in-flight task. */
  recordAttempt(id: string): number {
    const task = this.requireInFlight(id);
    task.attempts++;
    return task.attempts;
  }

  markSucceeded(id: string, payload: Payload): void {
    const task = this.requireInFlight(id);
    task.payload = payload;
    task.lastError = undefined;
    this.compareAndSet(id, ['IN_FLIGHT'], 'SUCCEEDED');
  }

  scheduleRetry(id: string, notBefore: number, error: ErrorKind): void {
    const task = this.requireInFlight(id);
    task.lastError = error;
    task.nextEligibleAt = notBefore;
    this.compareAndSet(id, ['IN_FLIGHT'], 'FAILED_RETRYABLE');
    this.notifyChange();
    this.checkSettled(task.stage);
  }

  markFailed(id: string, error: ErrorKind): void {
    const task = this.requireInFlight(id);
    task.lastError = error;
    this.compareAndSet(id, ['IN_FLIGHT'], 'FAILED_PERMANENT');
  }

  /**
   * Hand an in-flight task back without it counting as an attempt
   * (identity stall, or a worker stopping before its request went out).
   */
  requeue(id: string, notBefore: number): void {
    const task = this.requireInFlight(id);
    task.nextEligibleAt = notBefore;
    this.compareAndSet(id, ['IN_FLIGHT'], 'PENDING');
    this.notifyChange();
    this.checkSettled(task.stage);
  }

  /**
   * Stop dispatching. Tasks already in flight may still finish.
   */
  halt(): void {
    if (this.halted) return;
    this.halted = true;
    log.debug('Queue halted');
    this.notifyChange();
    for (const stage of Array.from(this.settleWaiters.keys())) {
      this.checkSettled(stage);
    }
  }

  isHalted(): boolean {
    return this.halted;
  }

  counts(stage: Stage): StageStatusCounts {
    const counts: StageStatusCounts = {
      total: 0,
      pending: 0,
      inFlight: 0,
      retryable: 0,
      succeeded: 0,
      failedPermanent: 0
    };

    for (const { task } of this.entries.values()) {
      if (task.stage !== stage) continue;
      counts.total++;
      switch (task.status) {
        case 'PENDING': counts.pending++; break;
        case 'IN_FLIGHT': counts.inFlight++; break;
        case 'FAILED_RETRYABLE': counts.retryable++; break;
        case 'SUCCEEDED': counts.succeeded++; break;
        case 'FAILED_PERMANENT': counts.failedPermanent++; break;
      }
    }
    return counts;
  }

  /**
   * Resolves once every task of the stage is terminal, or, after a halt,
   * once none of them is still in flight.
   */
  whenSettled(stage: Stage): Promise<void> {
    return new Promise(resolve => {
      const waiters = this.settleWaiters.get(stage) ?? [];
      waiters.push(resolve);
      this.settleWaiters.set(stage, waiters);
      this.checkSettled(stage);
    });
  }

  /**
   * Remove the stage's tasks once the coordinator has counted them.
   * Non-terminal tasks only remain after a halt; they come back as abandoned.
   */
  collectTerminal(stage: Stage): { terminal: Task[]; abandoned: Task[] } {
    const terminal: Task[] = [];
    const abandoned: Task[] = [];
    for (const [id, { task }] of this.entries) {
      if (task.stage !== stage) continue;
      (isTerminal(task.status) ? terminal : abandoned).push(task);
      this.entries.delete(id);
    }
    return { terminal, abandoned };
  }

  /** Resolves on the next enqueue, retry schedule, requeue or halt. */
  changed(): Promise<void> {
    return new Promise(resolve => {
      this.changeWaiters.push(resolve);
    });
  }

  /** Wake everything blocked on changed(). */
  notifyChange(): void {
    const waiters = this.changeWaiters;
    this.changeWaiters = [];
    for (const wake of waiters) wake();
  }

  subscribe(listener: TaskListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get size(): number {
    return this.entries.size;
  }

  private onTerminal(task: Task): void {
    // Listeners may enqueue follow-up tasks of the same stage before the
    // settle check runs, so a stage never looks drained too early
    for (const listener of this.listeners) {
      listener(task);
    }
    this.checkSettled(task.stage);
  }

  private checkSettled(stage: Stage): void {
    const waiters = this.settleWaiters.get(stage);
    if (!waiters || waiters.length === 0) return;

    const counts = this.counts(stage);
    const settled = this.halted
      ? counts.inFlight === 0
      : counts.pending + counts.inFlight + counts.retryable === 0;

    if (settled) {
      this.settleWaiters.delete(stage);
      for (const resolve of waiters) resolve();
    }
  }

  private requireInFlight(id: string): Task {
    const entry = this.entries.get(id);
    if (!entry) {
      throw new Error(`Unknown task: ${id}`);
    }
    if (entry.task.status !== 'IN_FLIGHT') {
      throw new Error(`Task ${id} is ${entry.task.status}, expected IN_FLIGHT`);
    }
    return entry.task;
  }
}
