/**
 * Shared state for one graph execution: an append-only message log, plus an
 * optional current execution plan for plan-aware workflows.
 *
 * No locking: a memory is only ever touched by the single logical thread of
 * the run that owns it.
 */

import { Message } from '../../types/messageTypes';
import { ExecutionPlan } from './executionPlan';

export interface Memory {
  append(message: Message): void;
  /** Ordered snapshot; later appends do not show up in it */
  read(): Message[];
}

export interface PlanStore {
  addPlan(plan: ExecutionPlan): void;
  getCurrentPlan(): ExecutionPlan | null;
  updatePlan(plan: ExecutionPlan): void;
}

export type MemoryFactory = () => Memory;

export class MessageMemory implements Memory {
  private readonly messages: Message[] = [];

  constructor(initial: Message[] = []) {
    this.messages.push(...initial);
  }

  append(message: Message): void {
    this.messages.push(message);
  }

  read(): Message[] {
    return [...this.messages];
  }

  get size(): number {
    return this.messages.length;
  }
}

export class PlanAwareMemory extends MessageMemory implements PlanStore {
  private currentPlan: ExecutionPlan | null = null;
  private readonly history: ExecutionPlan[] = [];

  addPlan(plan: ExecutionPlan): void {
    if (this.currentPlan) {
      this.history.push(this.currentPlan);
    }
    this.currentPlan = plan;
  }

  getCurrentPlan(): ExecutionPlan | null {
    return this.currentPlan;
  }

  updatePlan(plan: ExecutionPlan): void {
    this.currentPlan = plan;
  }

  /** Plans superseded by a later `addPlan`, oldest first */
  previousPlans(): ExecutionPlan[] {
    return [...this.history];
  }
}

export function isPlanAware(memory: Memory): memory is Memory & PlanStore {
  return (
    'getCurrentPlan' in memory &&
    typeof memory.getCurrentPlan === 'function' &&
    'addPlan' in memory &&
    typeof memory.addPlan === 'function' &&
    'updatePlan' in memory &&
    typeof memory.updatePlan === 'function'
  );
}

/**
 * Capability of nodes that hold their own memory and can start over with a
 * fresh one, e.g. between ForEach iterations.
 */
export interface MemoryOwner {
  readonly memory: Memory;
  resetMemory(): void;
}

export function isMemoryOwner(node: object): node is MemoryOwner {
  return 'resetMemory' in node && typeof node.resetMemory === 'function' && 'memory' in node;
}
