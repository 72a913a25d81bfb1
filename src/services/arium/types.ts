import { Message, NodeInput, Variables } from '../../types/messageTypes';
import { Memory, PlanStore } from './memory';

export type NodeOutput = Message | Message[];

export interface NodeRunContext {
  /** Memory of the run invoking the node */
  memory: Memory;
  /** Node names visited so far, current node last */
  path: readonly string[];
}

/**
 * Uniform contract of every graph node. The engine only ever calls `run`.
 */
export interface ExecutableNode {
  readonly name: string;
  /** Restrict inputs to messages from these sources (`input` = initial inputs) */
  readonly inputFilter?: readonly string[];
  run(inputs: NodeInput[], variables: Variables, context?: NodeRunContext): Promise<NodeOutput>;
}

/**
 * Capability of nodes whose configuration contains `<name>` placeholders.
 */
export interface VariableConsumer {
  requiredVariables(): Set<string>;
  /** Substitute placeholders once, before the node first runs */
  resolveVariables(variables: Variables): void;
}

export function isVariableConsumer(node: object): node is VariableConsumer {
  return (
    'requiredVariables' in node &&
    typeof node.requiredVariables === 'function' &&
    'resolveVariables' in node &&
    typeof node.resolveVariables === 'function'
  );
}

export type RouterMemory = Memory | (Memory & PlanStore);

export interface RoutingContext {
  currentNode: string;
  candidates: readonly string[];
  /** Completed runs per node so far in this execution */
  visitCounts: ReadonlyMap<string, number>;
  path: readonly string[];
}

export type Router = (memory: RouterMemory, context: RoutingContext) => string | Promise<string>;

export interface Edge {
  from: string;
  to: readonly string[];
  router?: Router;
}

export interface AriumDefinition {
  nodes: ReadonlyMap<string, ExecutableNode>;
  edges: ReadonlyMap<string, Edge>;
  start: string;
  terminals: ReadonlySet<string>;
}

export type AriumEventType =
  | 'workflow_started'
  | 'workflow_completed'
  | 'workflow_failed'
  | 'node_started'
  | 'node_completed'
  | 'node_failed'
  | 'router_decision'
  | 'edge_traversed';

export const ARIUM_EVENT_TYPES: readonly AriumEventType[] = [
  'workflow_started',
  'workflow_completed',
  'workflow_failed',
  'node_started',
  'node_completed',
  'node_failed',
  'router_decision',
  'edge_traversed',
];

export interface AriumEvent {
  type: AriumEventType;
  timestamp: string;
  nodeName?: string;
  durationMs?: number;
  error?: string;
  routerChoice?: string;
  toNode?: string;
}

export type AriumEventCallback = (event: AriumEvent) => void;
