import type {
  ChildState,
  TreeEdge,
  TreeNode,
  TreeObserver,
  TreeTop,
} from "./types.js";

/**
 * Fill colors per child state. Absent nodes are left unfilled.
 */
const FILL_COLORS: Record<Exclude<ChildState, "absent">, string> = {
  leaf: "lawngreen",
  internal: "gray70",
  witness: "red",
};

const TOP_FILL_COLOR = "gray70";

/**
 * Renders the observed tree as an undirected Graphviz graph.
 *
 * Nodes are named L{level}_{index}. Each instance belongs to a single
 * estimate; create a fresh one per contract.
 */
export class DotGraphObserver implements TreeObserver {
  private readonly lines: string[] = [];
  private complete = false;

  onEdge(edge: TreeEdge): void {
    const child = nodeName(edge.child);
    this.lines.push(`${nodeName(edge.parent)} -- ${child}`);
    if (edge.state !== "absent") {
      this.lines.push(filled(child, FILL_COLORS[edge.state]));
    }
  }

  onTop(top: TreeTop): void {
    for (const index of top.nodes) {
      this.lines.push(filled(nodeName({ level: top.level, index }), TOP_FILL_COLOR));
    }
    this.complete = true;
  }

  /** Whether the estimate reached the top level */
  get isComplete(): boolean {
    return this.complete;
  }

  toString(): string {
    return ["graph {", ...this.lines, "}", ""].join("\n");
  }
}

function nodeName(node: TreeNode): string {
  return `L${node.level}_${node.index}`;
}

function filled(name: string, color: string): string {
  return `${name} [style="filled" fillcolor=${color}]`;
}
