import { RelationshipType } from '../types/index.js';
import type { DotRenderOptions, Fact, Relationship } from '../types/index.js';
import type { KnowledgeGraph } from '../knowledge-graph/index.js';

const EDGE_STYLES: Record<RelationshipType, { color: string; style: string }> = {
  [RelationshipType.SUPPORTS]: { color: 'green', style: 'solid' },
  [RelationshipType.CONTRADICTS]: { color: 'red', style: 'dashed' },
  [RelationshipType.NEUTRAL]: { color: 'gray', style: 'dotted' },
};

function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\r?\n/g, '\\n')}"`;
}

export function truncateLabel(content: string, maxLength: number): string {
  return content.length > maxLength ? `${content.slice(0, maxLength)}...` : content;
}

/**
 * Render facts and relationships as a Graphviz digraph.
 * Edge colour and line style follow the relationship type.
 */
export function renderDot(
  facts: readonly Fact[],
  relationships: readonly Relationship[],
  options: DotRenderOptions = {}
): string {
  const maxLabelLength = options.maxLabelLength ?? 30;
  const showLabels = options.showLabels ?? true;
  const title = options.title ?? 'Knowledge Network';

  const lines: string[] = [
    'digraph factweave {',
    `  label=${quote(title)};`,
    '  node [shape=ellipse, style=filled, fillcolor=lightblue];',
  ];

  for (const fact of facts) {
    const label = showLabels ? truncateLabel(fact.content, maxLabelLength) : '';
    lines.push(`  ${quote(fact.id)} [label=${quote(label)}];`);
  }

  for (const rel of relationships) {
    const { color, style } = EDGE_STYLES[rel.type];
    lines.push(
      `  ${quote(rel.sourceId)} -> ${quote(rel.targetId)} [color=${color}, style=${style}, label="${rel.confidence.toFixed(2)}"];`
    );
  }

  lines.push('}');
  return lines.join('\n');
}

/**
 * Read-only view over a KnowledgeGraph for human inspection
 */
export class NetworkVisualizer {
  constructor(private graph: KnowledgeGraph) { }

  async toDot(options?: DotRenderOptions): Promise<string> {
    const facts = await this.graph.getAllFacts();
    const relationships = await this.graph.getRelationships();
    return renderDot(facts, relationships, options);
  }
}
