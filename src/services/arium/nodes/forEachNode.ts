import type winston from 'winston';
import defaultLogger from '../../../utils/logger';
import { Message, NodeInput, Variables } from '../../../types/messageTypes';
import { isMemoryOwner } from '../memory';
import { ExecutableNode, isVariableConsumer, NodeRunContext, VariableConsumer } from '../types';

export type MemoryPolicy = 'isolated' | 'shared';

export interface ForEachNodeOptions {
  name: string;
  target: ExecutableNode;
  /** `isolated` resets a memory-owning target before every item */
  memoryPolicy?: MemoryPolicy;
  inputFilter?: string[];
  logger?: winston.Logger;
}

/**
 * Applies `target` to every input in order, one at a time. The target is not
 * a node of the graph, so its placeholders are reported and resolved through
 * this node.
 */
export class ForEachNode implements ExecutableNode, VariableConsumer {
  readonly name: string;
  readonly target: ExecutableNode;
  readonly memoryPolicy: MemoryPolicy;
  readonly inputFilter?: string[];
  private readonly logger: winston.Logger;

  constructor(options: ForEachNodeOptions) {
    this.name = options.name;
    this.target = options.target;
    this.memoryPolicy = options.memoryPolicy ?? 'isolated';
    this.inputFilter = options.inputFilter;
    this.logger = options.logger ?? defaultLogger;
  }

  requiredVariables(): Set<string> {
    return isVariableConsumer(this.target) ? this.target.requiredVariables() : new Set();
  }

  resolveVariables(variables: Variables): void {
    if (isVariableConsumer(this.target)) {
      this.target.resolveVariables(variables);
    }
  }

  async run(inputs: NodeInput[], variables: Variables = {}, context?: NodeRunContext): Promise<Message[]> {
    const results: Message[] = [];

    for (const [index, item] of inputs.entries()) {
      if (this.memoryPolicy === 'isolated' && isMemoryOwner(this.target)) {
        this.target.resetMemory();
      }
      this.logger.debug('ForEach processing item', { node: this.name, item: index + 1, total: inputs.length });

      const output = await this.target.run([item], { ...variables }, context);
      const result = Array.isArray(output) ? output[output.length - 1] : output;
      if (result !== undefined) {
        results.push(result);
      }
    }

    this.logger.info('ForEach completed', { node: this.name, items: results.length });
    return results;
  }
}
