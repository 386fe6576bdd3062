export const SYSTEM_PROMPT = `You are working with a fact graph: short natural-language facts joined by directed relationships that either SUPPORT, CONTRADICT or are NEUTRAL towards another fact, each with a confidence between 0.0 and 1.0.

TOOL USAGE WORKFLOW:
1. Use \`add_fact\` to record a new fact. Relationship detection (when enabled) runs in the background.
2. Use \`wait_for_processing\` before reading if you need the detected relationships of facts you just added.
3. Use \`add_relationship\` to record a relationship you are sure of. It replaces any edge between the same two facts in the same direction.
4. Use \`get_supporting_facts\` and \`get_contradicting_facts\` to see the evidence for and against a fact.
5. Use \`get_relationships\` for the raw edges around a fact, optionally filtered by type.
6. Use \`get_network_stats\` for totals and \`render_graph\` for a Graphviz view.

DIRECTION: an edge A -> B of type supports means "A supports B". Facts supporting B are the sources of edges pointing at B.`;

export const TOOL_PROMPTS: Record<string, string> = {
  add_fact:
    'Add one atomic fact per call. Supply your own id only when you need a stable reference; otherwise one is generated.',

  add_relationship:
    'Relate two existing facts. The source is the fact that supports, contradicts or is neutral towards the target. Default confidence is 1.0.',

  get_supporting_facts:
    'List facts that support the given fact. Summarise them as evidence rather than listing ids.',

  get_contradicting_facts:
    'List facts that contradict the given fact. Point out the strongest conflicts first.',

  wait_for_processing:
    'Blocks until every fact added so far has been through relationship detection.',

  render_graph:
    'Returns a Graphviz DOT document. Green solid edges support, red dashed edges contradict, gray dotted edges are neutral.',
};
