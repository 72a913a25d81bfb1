import { Message, NodeInput, Variables } from '../../../types/messageTypes';
import { createMessage, isMessage } from '../messages';
import { ExecutableNode, NodeOutput, NodeRunContext } from '../types';

export type NodeFunctionResult = Message | Message[] | string | null | undefined | object | number | boolean;

export type NodeFunction = (
  inputs: NodeInput[],
  variables: Variables,
  context?: NodeRunContext,
) => NodeFunctionResult | Promise<NodeFunctionResult>;

export interface FunctionNodeOptions {
  name: string;
  fn: NodeFunction;
  description?: string;
  inputFilter?: string[];
}

/**
 * Wraps a plain callable. Whatever it returns is turned into messages:
 * messages pass through, strings become assistant text, nullish yields
 * nothing and anything else is serialized as JSON.
 */
export class FunctionNode implements ExecutableNode {
  readonly name: string;
  readonly description: string;
  readonly inputFilter?: string[];
  private readonly fn: NodeFunction;

  constructor(options: FunctionNodeOptions) {
    this.name = options.name;
    this.fn = options.fn;
    this.description = options.description ?? '';
    this.inputFilter = options.inputFilter;
  }

  async run(inputs: NodeInput[], variables: Variables = {}, context?: NodeRunContext): Promise<NodeOutput> {
    const result = await this.fn(inputs, variables, context);
    return this.toOutput(result);
  }

  private toOutput(result: NodeFunctionResult): NodeOutput {
    if (result === null || result === undefined) {
      return [];
    }
    if (isMessage(result)) {
      return result;
    }
    if (Array.isArray(result) && result.every(isMessage)) {
      return result;
    }
    const text = typeof result === 'string' ? result : JSON.stringify(result);
    return createMessage('assistant', text, { source: this.name });
  }
}
