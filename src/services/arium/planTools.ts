import { isPlanAware, PlanStore } from './memory';
import { Tool } from '../llm/modelClient';
import { formatPlan, parsePlanText } from './planParser';
import { NodeRunContext } from './types';

const NO_PLAN_STORE = 'Error: no plan-aware memory is available.';

function stringArg(args: Record<string, unknown>, name: string): string {
  const value = args[name];
  return typeof value === 'string' ? value : '';
}

/**
 * Tools that let agents of a plan-execute workflow write and advance the
 * plan held by plan-aware memory. The memory of the calling run wins over
 * `fallback`, so one set of tools serves every run of a graph.
 */
export function createPlanTools(nodeName: string, fallback?: PlanStore): Tool[] {
  const storeFor = (context?: NodeRunContext): PlanStore | undefined =>
    context && isPlanAware(context.memory) ? context.memory : fallback;

  const storePlan: Tool = {
    name: 'store_execution_plan',
    description: 'Store a new execution plan. Use the EXECUTION PLAN / DESCRIPTION / numbered step format.',
    parameters: {
      type: 'object',
      properties: {
        plan_text: { type: 'string', description: 'The full plan text' },
      },
      required: ['plan_text'],
    },
    execute: (args, context) => {
      const memory = storeFor(context);
      if (!memory) return NO_PLAN_STORE;
      const plan = parsePlanText(stringArg(args, 'plan_text'), { createdBy: nodeName });
      if (!plan) {
        return 'Error: no steps found. Use lines like "1. step_id: description → node (depends on: other_step)".';
      }
      memory.addPlan(plan);
      return `Stored plan "${plan.title}" with ${plan.steps.length} steps.`;
    },
  };

  const completeStep: Tool = {
    name: 'complete_step',
    description: 'Mark a plan step as completed and record its result.',
    parameters: {
      type: 'object',
      properties: {
        step_id: { type: 'string', description: 'Id of the finished step' },
        result: { type: 'string', description: 'Short summary of the outcome' },
      },
      required: ['step_id'],
    },
    execute: (args, context) => {
      const memory = storeFor(context);
      if (!memory) return NO_PLAN_STORE;
      const plan = memory.getCurrentPlan();
      if (!plan) return 'Error: no execution plan is stored.';
      const stepId = stringArg(args, 'step_id');
      if (!plan.getStep(stepId)) return `Error: plan has no step "${stepId}".`;
      plan.markStep(stepId, 'completed', stringArg(args, 'result') || undefined);
      memory.updatePlan(plan);
      return `Step ${stepId} completed.`;
    },
  };

  const checkStatus: Tool = {
    name: 'check_plan_status',
    description: 'Show the current execution plan and the status of every step.',
    parameters: { type: 'object', properties: {} },
    execute: (_args, context) => {
      const memory = storeFor(context);
      if (!memory) return NO_PLAN_STORE;
      const plan = memory.getCurrentPlan();
      return plan ? formatPlan(plan) : 'No execution plan is stored.';
    },
  };

  return [storePlan, completeStep, checkStatus];
}
