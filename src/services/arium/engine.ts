import { errorMessage, RoutingError } from '../../middleware/errors';
import { INPUT_SOURCE, Message, NodeInput, Variables } from '../../types/messageTypes';
import { defaultObservability, Observability } from '../../utils/observability';
import { attributeTo, createMessage, withSource } from './messages';
import { Memory, MemoryFactory, MessageMemory } from './memory';
import { validateDefinition } from './policies';
import {
  ARIUM_EVENT_TYPES,
  AriumDefinition,
  AriumEvent,
  AriumEventCallback,
  AriumEventType,
  Edge,
  ExecutableNode,
  isVariableConsumer,
  NodeOutput,
  RoutingContext,
} from './types';
import {
  extractVariablesFromInputs,
  INPUTS_OWNER,
  resolveVariables,
  validateVariables,
} from './variables';

export interface AriumOptions {
  name?: string;
  observability?: Observability;
  /** Builds the memory for each run that is not given one explicitly */
  memoryFactory?: MemoryFactory;
}

export interface RunOptions {
  variables?: Record<string, string>;
  /** Explicitly injected memory; otherwise a fresh one per run */
  memory?: Memory;
  onEvent?: AriumEventCallback;
  eventsFilter?: readonly AriumEventType[];
}

interface RunState {
  memory: Memory;
  variables: Variables;
  visitCounts: Map<string, number>;
  path: string[];
  emit: (type: AriumEventType, fields?: Omit<AriumEvent, 'type' | 'timestamp'>) => void;
}

/**
 * Compiled graph. The definition is validated and frozen on construction;
 * every `run` walks it from the start node until an end node completes.
 *
 * Runs are single-threaded: one node at a time, each awaited before the
 * next transition is resolved. There is no hop budget, so cyclic routing
 * must be bounded by its routers.
 */
export class Arium {
  readonly name: string;
  private readonly definition: AriumDefinition;
  private readonly observability: Observability;
  private readonly memoryFactory: MemoryFactory;

  constructor(definition: AriumDefinition, options: AriumOptions = {}) {
    validateDefinition(definition);
    this.definition = Object.freeze({
      nodes: new Map(definition.nodes),
      edges: new Map(
        [...definition.edges].map(([from, edge]) => [
          from,
          Object.freeze({ ...edge, to: Object.freeze([...edge.to]) }),
        ]),
      ),
      start: definition.start,
      terminals: new Set(definition.terminals),
    });
    this.name = options.name ?? 'arium';
    this.observability = options.observability ?? defaultObservability();
    this.memoryFactory = options.memoryFactory ?? (() => new MessageMemory());
  }

  get startNode(): string {
    return this.definition.start;
  }

  get terminalNodes(): string[] {
    return [...this.definition.terminals];
  }

  get nodeNames(): string[] {
    return [...this.definition.nodes.keys()];
  }

  getNode(name: string): ExecutableNode | undefined {
    return this.definition.nodes.get(name);
  }

  getEdges(): Edge[] {
    return [...this.definition.edges.values()];
  }

  /** A fresh memory of the kind this graph's runs use */
  createMemory(): Memory {
    return this.memoryFactory();
  }

  /**
   * Placeholders required by each node, keyed by node name.
   */
  requiredVariables(): Map<string, Set<string>> {
    const required = new Map<string, Set<string>>();
    for (const node of this.definition.nodes.values()) {
      if (!isVariableConsumer(node)) continue;
      const names = node.requiredVariables();
      if (names.size) {
        required.set(node.name, names);
      }
    }
    return required;
  }

  async run(inputs: NodeInput[], options: RunOptions = {}): Promise<Message[]> {
    const { logger, metrics } = this.observability;
    const variables: Variables = Object.freeze({ ...(options.variables ?? {}) });
    const filter = new Set(options.eventsFilter ?? ARIUM_EVENT_TYPES);
    const emit: RunState['emit'] = (type, fields = {}) => {
      if (!options.onEvent || !filter.has(type)) return;
      options.onEvent({ type, timestamp: new Date().toISOString(), ...fields });
    };

    emit('workflow_started');
    logger.info('Arium run started', { arium: this.name, start: this.definition.start });

    try {
      this.prepareVariables(inputs, variables);

      const memory = options.memory ?? this.createMemory();
      for (const input of inputs) {
        memory.append(this.toInputMessage(input, variables));
      }

      const state: RunState = { memory, variables, visitCounts: new Map(), path: [], emit };
      await this.traverse(state);

      metrics.increment('arium.runs', { arium: this.name, status: 'completed' });
      emit('workflow_completed');
      logger.info('Arium run completed', { arium: this.name, path: state.path.join(' -> ') });
      return memory.read();
    } catch (error) {
      metrics.increment('arium.runs', { arium: this.name, status: 'failed' });
      emit('workflow_failed', { error: errorMessage(error) });
      logger.error('Arium run failed', { arium: this.name, error: errorMessage(error) });
      throw error;
    }
  }

  private prepareVariables(inputs: NodeInput[], variables: Variables): void {
    const required = this.requiredVariables();
    const fromInputs = extractVariablesFromInputs(inputs);
    if (fromInputs.size) {
      required.set(INPUTS_OWNER, fromInputs);
    }
    validateVariables(required, variables);

    for (const node of this.definition.nodes.values()) {
      if (isVariableConsumer(node)) {
        node.resolveVariables(variables);
      }
    }
  }

  private toInputMessage(input: NodeInput, variables: Variables): Message {
    if (typeof input === 'string') {
      return createMessage('user', resolveVariables(input, variables, INPUTS_OWNER), {
        source: INPUT_SOURCE,
      });
    }
    if (input.content.type === 'text') {
      return createMessage(
        input.role,
        { type: 'text', text: resolveVariables(input.content.text, variables, INPUTS_OWNER) },
        { source: input.source ?? INPUT_SOURCE, metadata: input.metadata ? { ...input.metadata } : undefined },
      );
    }
    return withSource(input, INPUT_SOURCE);
  }

  private async traverse(state: RunState): Promise<void> {
    let current = this.definition.start;

    for (;;) {
      state.path.push(current);
      const node = this.definition.nodes.get(current);
      if (!node) {
        throw new RoutingError(`Node ${current} is not registered`, {
          fromNode: state.path[state.path.length - 2] ?? current,
          candidates: this.nodeNames,
        });
      }

      const output = await this.executeNode(node, state);
      this.record(node, output, state.memory);
      state.visitCounts.set(current, (state.visitCounts.get(current) ?? 0) + 1);

      if (this.definition.terminals.has(current)) {
        return;
      }

      const next = await this.resolveNext(current, state);
      state.emit('edge_traversed', { nodeName: current, toNode: next });
      current = next;
    }
  }

  private async executeNode(node: ExecutableNode, state: RunState): Promise<NodeOutput> {
    const { logger, metrics } = this.observability;
    const snapshot = state.memory.read();
    const inputs = node.inputFilter
      ? snapshot.filter((message) => message.source !== undefined && node.inputFilter?.includes(message.source))
      : snapshot;

    state.emit('node_started', { nodeName: node.name });
    logger.debug('Executing node', { arium: this.name, node: node.name, inputs: inputs.length });
    const started = Date.now();

    try {
      const output = await node.run(inputs, state.variables, {
        memory: state.memory,
        path: [...state.path],
      });
      const durationMs = Date.now() - started;
      metrics.increment('arium.node.runs', { node: node.name });
      state.emit('node_completed', { nodeName: node.name, durationMs });
      return output;
    } catch (error) {
      const durationMs = Date.now() - started;
      metrics.increment('arium.node.failures', { node: node.name });
      state.emit('node_failed', { nodeName: node.name, durationMs, error: errorMessage(error) });
      logger.warn('Node failed', { arium: this.name, node: node.name, durationMs, error: errorMessage(error) });
      throw error;
    }
  }

  private record(node: ExecutableNode, output: NodeOutput, memory: Memory): void {
    const messages = Array.isArray(output) ? output : [output];
    for (const message of messages) {
      memory.append(attributeTo(message, node.name));
    }
  }

  private async resolveNext(current: string, state: RunState): Promise<string> {
    const edge = this.definition.edges.get(current);
    if (!edge) {
      throw new RoutingError(`Node ${current} has no outgoing edge`, { fromNode: current });
    }

    if (!edge.router) {
      return edge.to[0];
    }

    const context: RoutingContext = {
      currentNode: current,
      candidates: edge.to,
      visitCounts: new Map(state.visitCounts),
      path: [...state.path],
    };
    const chosen = await edge.router(state.memory, context);

    if (!edge.to.includes(chosen)) {
      throw new RoutingError(`Router for ${current} returned unknown node "${chosen}"`, {
        fromNode: current,
        chosen,
        candidates: [...edge.to],
      });
    }

    this.observability.metrics.increment('arium.router.decisions', { from: current, to: chosen });
    state.emit('router_decision', { nodeName: current, routerChoice: chosen });
    this.observability.logger.debug('Router decision', { arium: this.name, from: current, to: chosen });
    return chosen;
  }
}
