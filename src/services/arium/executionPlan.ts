import { randomUUID } from 'crypto';
import { PlanDefinition, PlanStep, StepStatus } from '../../types/planTypes';

/**
 * Decomposed task held by plan-aware memory. Steps are mutated in place by
 * the nodes executing them; memory replaces the whole plan on update.
 */
export class ExecutionPlan {
  readonly id: string;
  title: string;
  description: string;
  readonly steps: PlanStep[];
  readonly createdBy?: string;

  constructor(definition: Partial<PlanDefinition> & { steps: PlanStep[] }) {
    this.id = definition.id ?? randomUUID();
    this.title = definition.title ?? 'Execution plan';
    this.description = definition.description ?? '';
    this.steps = definition.steps.map((step) => ({
      ...step,
      dependencies: [...step.dependencies],
    }));
    this.createdBy = definition.createdBy;

    const seen = new Set<string>();
    for (const step of this.steps) {
      if (seen.has(step.id)) {
        throw new Error(`Duplicate plan step id: ${step.id}`);
      }
      seen.add(step.id);
    }
  }

  getStep(id: string): PlanStep | undefined {
    return this.steps.find((step) => step.id === id);
  }

  completedStepIds(): Set<string> {
    return new Set(this.steps.filter((s) => s.status === 'completed').map((s) => s.id));
  }

  /**
   * Steps that can run now: not finished, every dependency completed.
   * Returned in declared order.
   */
  getReadySteps(): PlanStep[] {
    const completed = this.completedStepIds();
    return this.steps.filter(
      (step) =>
        (step.status === 'pending' || step.status === 'in_progress') &&
        step.dependencies.every((dep) => completed.has(dep)),
    );
  }

  isCompleted(): boolean {
    return this.steps.every((step) => step.status === 'completed');
  }

  hasFailed(): boolean {
    return this.steps.some((step) => step.status === 'failed');
  }

  markStep(id: string, status: StepStatus, result?: string): PlanStep {
    const step = this.getStep(id);
    if (!step) {
      throw new Error(`Plan step not found: ${id}`);
    }
    step.status = status;
    if (result !== undefined) {
      step.result = result;
    }
    return step;
  }

  toJSON(): PlanDefinition {
    return {
      id: this.id,
      title: this.title,
      description: this.description,
      steps: this.steps.map((step) => ({ ...step, dependencies: [...step.dependencies] })),
      createdBy: this.createdBy,
    };
  }
}

export function createStep(
  id: string,
  node: string,
  description = '',
  dependencies: string[] = [],
): PlanStep {
  return { id, node, description, dependencies, status: 'pending' };
}
