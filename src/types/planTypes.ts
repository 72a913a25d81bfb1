/**
 * Type definitions for execution plans kept in plan-aware memory
 */

export type StepStatus = 'pending' | 'in_progress' | 'completed' | 'failed';

export interface PlanStep {
  id: string;
  description: string;
  /** Node assigned to carry out the step */
  node: string;
  dependencies: string[];
  status: StepStatus;
  result?: string;
}

export interface PlanDefinition {
  id: string;
  title: string;
  description: string;
  steps: PlanStep[];
  createdBy?: string;
}
