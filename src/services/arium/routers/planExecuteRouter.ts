import type winston from 'winston';
import defaultLogger from '../../../utils/logger';
import { RoutingError } from '../../../middleware/errors';
import { isPlanAware } from '../memory';
import { Router, RouterMemory, RoutingContext } from '../types';

export interface PlanExecuteRouterOptions {
  plannerNode: string;
  reviewerNode: string;
  /** Runs steps whose assigned node is not a candidate of the edge */
  executorNode?: string;
  logger?: winston.Logger;
}

/**
 * Routes by the current execution plan: planner until a plan exists, then
 * the first ready step's node, then the reviewer once every step is done.
 */
export class PlanExecuteRouter {
  readonly plannerNode: string;
  readonly reviewerNode: string;
  readonly executorNode?: string;
  private readonly logger: winston.Logger;

  constructor(options: PlanExecuteRouterOptions) {
    this.plannerNode = options.plannerNode;
    this.reviewerNode = options.reviewerNode;
    this.executorNode = options.executorNode;
    this.logger = options.logger ?? defaultLogger;
  }

  route(memory: RouterMemory, context: RoutingContext): string {
    if (!isPlanAware(memory)) {
      throw new RoutingError('Plan-execute routing needs a plan-aware memory', {
        fromNode: context.currentNode,
        candidates: [...context.candidates],
      });
    }

    const plan = memory.getCurrentPlan();
    if (!plan) {
      return this.plannerNode;
    }
    if (plan.isCompleted()) {
      this.logger.info('Plan completed, routing to reviewer', { plan: plan.id, reviewer: this.reviewerNode });
      return this.reviewerNode;
    }

    const [step] = plan.getReadySteps();
    if (!step) {
      const blocked = plan.steps.filter((candidate) => candidate.status !== 'completed').map((s) => s.id);
      throw new RoutingError(`Plan ${plan.id} has unfinished steps but none is ready: ${blocked.join(', ')}`, {
        fromNode: context.currentNode,
        candidates: [...context.candidates],
      });
    }

    if (step.status === 'pending') {
      plan.markStep(step.id, 'in_progress');
      memory.updatePlan(plan);
    }

    const target =
      !context.candidates.includes(step.node) && this.executorNode ? this.executorNode : step.node;
    this.logger.debug('Plan step routed', { step: step.id, node: target });
    return target;
  }

  asRouter(): Router {
    return (memory, context) => this.route(memory, context);
  }
}
