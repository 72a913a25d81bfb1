import { ConfigurationError } from '../../middleware/errors';
import { AriumDefinition } from './types';

export function assertNodeExists(def: AriumDefinition, node: string, role = 'Graph node'): void {
  if (!def.nodes.has(node)) {
    throw new ConfigurationError(`${role} not found: ${node}`, {
      reference: node,
      alternatives: [...def.nodes.keys()],
    });
  }
}

/**
 * Well-formedness checks run once, when a definition is compiled.
 */
export function validateDefinition(def: AriumDefinition): void {
  if (def.nodes.size === 0) {
    throw new ConfigurationError('Arium must contain at least one node');
  }
  if (!def.start) {
    throw new ConfigurationError('Arium has no start node');
  }
  assertNodeExists(def, def.start, 'Start node');

  if (def.terminals.size === 0) {
    throw new ConfigurationError('Arium must declare at least one end node');
  }
  for (const terminal of def.terminals) {
    assertNodeExists(def, terminal, 'End node');
  }

  for (const [from, edge] of def.edges) {
    assertNodeExists(def, from, 'Edge source');
    if (edge.to.length === 0) {
      throw new ConfigurationError(`Edge from ${from} has no target nodes`, { reference: from });
    }
    for (const to of edge.to) {
      assertNodeExists(def, to, `Edge target (from ${from})`);
    }
    if (!edge.router && edge.to.length > 1) {
      throw new ConfigurationError(
        `Edge from ${from} has ${edge.to.length} targets but no router`,
        { reference: from },
      );
    }
  }

  for (const name of def.nodes.keys()) {
    if (!def.terminals.has(name) && !def.edges.has(name)) {
      throw new ConfigurationError(
        `Node ${name} is neither an end node nor the source of an edge`,
        { reference: name },
      );
    }
  }
}
