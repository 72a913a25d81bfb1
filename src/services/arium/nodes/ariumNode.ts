import { ConfigurationError } from '../../../middleware/errors';
import { Message, NodeInput, Variables } from '../../../types/messageTypes';
import type { Arium } from '../engine';
import { Memory, MemoryOwner } from '../memory';
import { toMessage } from '../messages';
import { ExecutableNode, NodeRunContext, VariableConsumer } from '../types';

export interface AriumNodeOptions {
  name: string;
  arium: Arium;
  /** Pass a copy of the parent's variables to the sub-graph (default true) */
  inheritVariables?: boolean;
  /** Deliberately shared memory; otherwise a private one per parent run */
  memory?: Memory;
  inputFilter?: string[];
}

/**
 * A compiled sub-graph used as a single node of a parent graph.
 *
 * The sub-graph never sees the parent's memory: it receives the latest
 * incoming message as its only input and runs against the node's own memory.
 * That memory lasts for one parent run; a new parent run starts a new one.
 * The node returns just what the sub-graph produced.
 */
export class AriumNode implements ExecutableNode, VariableConsumer, MemoryOwner {
  readonly name: string;
  readonly arium: Arium;
  readonly inheritVariables: boolean;
  readonly inputFilter?: string[];
  private ownMemory: Memory;
  private readonly shared: boolean;
  /** Memory of the parent run `ownMemory` belongs to */
  private parentMemory?: Memory;

  constructor(options: AriumNodeOptions) {
    this.name = options.name;
    this.arium = options.arium;
    this.inheritVariables = options.inheritVariables ?? true;
    this.inputFilter = options.inputFilter;
    this.shared = options.memory !== undefined;
    this.ownMemory = options.memory ?? this.arium.createMemory();

    if (!this.inheritVariables) {
      const unsatisfiable = [...this.subGraphVariables()].sort();
      if (unsatisfiable.length) {
        throw new ConfigurationError(
          `Nested arium ${this.name} does not inherit variables but its nodes need: ${unsatisfiable.join(', ')}`,
          { reference: this.name },
        );
      }
    }
  }

  get memory(): Memory {
    return this.ownMemory;
  }

  resetMemory(): void {
    if (!this.shared) {
      this.ownMemory = this.arium.createMemory();
    }
  }

  requiredVariables(): Set<string> {
    return this.inheritVariables ? this.subGraphVariables() : new Set();
  }

  /** Sub-graph nodes are resolved by the sub-graph's own run. */
  resolveVariables(_variables: Variables): void {}

  async run(inputs: NodeInput[], variables: Variables = {}, context?: NodeRunContext): Promise<Message[]> {
    if (context && context.memory !== this.parentMemory) {
      this.resetMemory();
      this.parentMemory = context.memory;
    }

    const latest = inputs[inputs.length - 1];
    const subInputs = latest === undefined ? [] : [this.reauthor(latest)];
    const executionVariables = this.inheritVariables ? { ...variables } : {};

    const before = this.ownMemory.read().length + subInputs.length;
    const messages = await this.arium.run(subInputs, {
      variables: executionVariables,
      memory: this.ownMemory,
    });
    return messages.slice(before);
  }

  private subGraphVariables(): Set<string> {
    const names = new Set<string>();
    for (const required of this.arium.requiredVariables().values()) {
      required.forEach((name) => names.add(name));
    }
    return names;
  }

  private reauthor(input: NodeInput): Message {
    const message = toMessage(input);
    return { role: 'user', content: message.content };
  }
}
