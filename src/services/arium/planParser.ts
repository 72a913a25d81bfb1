import { PlanStep } from '../../types/planTypes';
import { ExecutionPlan } from './executionPlan';

const TITLE_PATTERN = /EXECUTION PLAN:\s*(.+)/;
const DESCRIPTION_PATTERN = /DESCRIPTION:\s*(.+)/;
// 1. step_id: description → node (depends on: a, b)
const STEP_PATTERN =
  /^\s*(\d+)\.\s*(\w+):\s*(.+?)\s*(?:→|->)\s*(\w+)(?:\s*\(depends on:\s*([^)]+)\))?\s*$/gm;

/**
 * Parse planner output into an ExecutionPlan. Returns null when the text
 * contains no step lines.
 */
export function parsePlanText(
  text: string,
  options: { createdBy?: string } = {},
): ExecutionPlan | null {
  const steps: PlanStep[] = [];
  for (const match of text.matchAll(STEP_PATTERN)) {
    const [, , id, description, node, deps] = match;
    steps.push({
      id,
      description: description.trim(),
      node,
      dependencies: deps ? deps.split(',').map((dep) => dep.trim()).filter(Boolean) : [],
      status: 'pending',
    });
  }

  if (steps.length === 0) return null;

  return new ExecutionPlan({
    title: TITLE_PATTERN.exec(text)?.[1].trim() ?? 'Generated Plan',
    description: DESCRIPTION_PATTERN.exec(text)?.[1].trim() ?? 'Execution plan',
    steps,
    createdBy: options.createdBy,
  });
}

const STATUS_ICONS: Record<PlanStep['status'], string> = {
  pending: '○',
  in_progress: '⏳',
  completed: '✓',
  failed: '✗',
};

export function formatPlan(plan: ExecutionPlan): string {
  const lines = [`EXECUTION PLAN: ${plan.title}`, `DESCRIPTION: ${plan.description}`];
  plan.steps.forEach((step, index) => {
    const deps = step.dependencies.length ? ` (depends on: ${step.dependencies.join(', ')})` : '';
    lines.push(
      `${index + 1}. ${step.id}: ${step.description} → ${step.node}${deps} [${STATUS_ICONS[step.status]} ${step.status}]`,
    );
  });
  return lines.join('\n');
}
