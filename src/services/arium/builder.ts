import { ConfigurationError } from '../../middleware/errors';
import { Message, NodeInput } from '../../types/messageTypes';
import { Observability } from '../../utils/observability';
import { Arium, RunOptions } from './engine';
import { Memory, MemoryFactory } from './memory';
import { Agent } from './nodes/agent';
import { FunctionNode, FunctionNodeOptions } from './nodes/functionNode';
import { Edge, ExecutableNode, Router } from './types';
import { toMermaid } from './visualize';

type NodeRef = ExecutableNode | string;

function nodeName(ref: NodeRef): string {
  return typeof ref === 'string' ? ref : ref.name;
}

/**
 * Fluent assembly of an Arium. Nothing is checked until `build()`, which
 * reports the first configuration problem it finds.
 *
 * @example
 * const arium = new AriumBuilder()
 *   .addAgents([researcher, writer])
 *   .startWith(researcher)
 *   .connect(researcher, writer)
 *   .endWith(writer)
 *   .build();
 */
export class AriumBuilder {
  private name?: string;
  private memoryFactory?: MemoryFactory;
  private observability?: Observability;
  private nodes: ExecutableNode[] = [];
  private edges: Edge[] = [];
  private start?: string;
  private terminals: string[] = [];
  private arium?: Arium;

  withName(name: string): this {
    this.name = name;
    return this;
  }

  /**
   * A factory gives every run a fresh memory. A memory instance is shared by
   * every run of the built graph.
   */
  withMemory(memory: Memory | MemoryFactory): this {
    this.memoryFactory = typeof memory === 'function' ? memory : () => memory;
    return this;
  }

  withObservability(observability: Observability): this {
    this.observability = observability;
    return this;
  }

  addNode(node: ExecutableNode): this {
    this.nodes.push(node);
    return this;
  }

  addNodes(nodes: ExecutableNode[]): this {
    nodes.forEach((node) => this.addNode(node));
    return this;
  }

  addAgent(agent: Agent): this {
    return this.addNode(agent);
  }

  addAgents(agents: Agent[]): this {
    return this.addNodes(agents);
  }

  addFunctionNode(node: FunctionNode | FunctionNodeOptions): this {
    return this.addNode(node instanceof FunctionNode ? node : new FunctionNode(node));
  }

  addFunctionNodes(nodes: Array<FunctionNode | FunctionNodeOptions>): this {
    nodes.forEach((node) => this.addFunctionNode(node));
    return this;
  }

  startWith(node: NodeRef): this {
    this.start = nodeName(node);
    return this;
  }

  endWith(node: NodeRef): this {
    const name = nodeName(node);
    if (!this.terminals.includes(name)) {
      this.terminals.push(name);
    }
    return this;
  }

  addEdge(from: NodeRef, to: NodeRef[], router?: Router): this {
    this.edges.push({ from: nodeName(from), to: to.map(nodeName), router });
    return this;
  }

  connect(from: NodeRef, to: NodeRef): this {
    return this.addEdge(from, [to]);
  }

  build(): Arium {
    const nodes = new Map<string, ExecutableNode>();
    for (const node of this.nodes) {
      if (nodes.has(node.name)) {
        throw new ConfigurationError(`Duplicate node name: ${node.name}`, { reference: node.name });
      }
      nodes.set(node.name, node);
    }

    const edges = new Map<string, Edge>();
    for (const edge of this.edges) {
      if (edges.has(edge.from)) {
        throw new ConfigurationError(`More than one edge declared from ${edge.from}`, { reference: edge.from });
      }
      edges.set(edge.from, edge);
    }

    this.arium = new Arium(
      { nodes, edges, start: this.start ?? '', terminals: new Set(this.terminals) },
      { name: this.name, observability: this.observability, memoryFactory: this.memoryFactory },
    );
    return this.arium;
  }

  async buildAndRun(inputs: NodeInput[], options: RunOptions = {}): Promise<Message[]> {
    return this.build().run(inputs, options);
  }

  toMermaid(): string {
    return toMermaid(this.arium ?? this.build());
  }

  reset(): this {
    this.name = undefined;
    this.memoryFactory = undefined;
    this.observability = undefined;
    this.nodes = [];
    this.edges = [];
    this.start = undefined;
    this.terminals = [];
    this.arium = undefined;
    return this;
  }
}

export function createArium(): AriumBuilder {
  return new AriumBuilder();
}
