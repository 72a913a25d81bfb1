import type { Arium } from './engine';

function nodeId(name: string): string {
  return name.replace(/[^A-Za-z0-9_]/g, '_');
}

/**
 * Mermaid `flowchart TD` source for a compiled graph. Routed transitions
 * are drawn dashed.
 */
export function toMermaid(arium: Arium): string {
  const lines = ['flowchart TD', '  __start__([START])', '  __end__([END])'];

  for (const name of arium.nodeNames) {
    lines.push(`  ${nodeId(name)}["${name.replace(/"/g, '#quot;')}"]`);
  }

  lines.push(`  __start__ --> ${nodeId(arium.startNode)}`);
  for (const edge of arium.getEdges()) {
    const arrow = edge.router ? '-.->' : '-->';
    for (const to of edge.to) {
      lines.push(`  ${nodeId(edge.from)} ${arrow} ${nodeId(to)}`);
    }
  }
  for (const terminal of arium.terminalNodes) {
    lines.push(`  ${nodeId(terminal)} --> __end__`);
  }

  return lines.join('\n');
}
