import { assertNever } from "./builder.js";
import type { ExecutionGraph, GraphNode, LeafNode } from "./types.js";

function leafLine(leaf: LeafNode): string {
  const tools = leaf.tools.map((t) => t.descriptor.name);
  return `${leaf.role} [${leaf.model}]${tools.length > 0 ? ` tools: ${tools.join(", ")}` : ""}`;
}

function describeNode(node: GraphNode, indent: string, out: string[]): void {
  switch (node.kind) {
    case "leaf":
      out.push(`${indent}${leafLine(node)}`);
      return;
    case "sequential":
      out.push(`${indent}sequential ${node.name}${node.chainMode === "accumulate" ? " (accumulate)" : ""}`);
      node.children.forEach((c) => describeNode(c, `${indent}  `, out));
      return;
    case "parallel":
      out.push(`${indent}parallel ${node.name}`);
      node.children.forEach((c) => describeNode(c, `${indent}  `, out));
      return;
    case "loop":
      out.push(`${indent}loop ${node.name} (max ${node.maxIterations} iterations)`);
      node.children.forEach((c) => describeNode(c, `${indent}  `, out));
      return;
    case "coordinator":
      out.push(`${indent}coordinator ${leafLine(node.coordinator)}`);
      node.workers.forEach((w) => out.push(`${indent}  worker ${leafLine(w)}`));
      return;
    case "hub": {
      const policy = node.unmatched.kind === "default" ? `default ${node.unmatched.spoke}` : node.unmatched.kind;
      out.push(`${indent}hub ${leafLine(node.hub)} (unmatched: ${policy})`);
      node.spokes.forEach((s) => out.push(`${indent}  spoke ${leafLine(s)}`));
      node.routes.forEach((r) => {
        const match = [...r.keywords.map((k) => `"${k}"`), ...(r.pattern ? [`/${r.pattern.source}/`] : [])];
        out.push(`${indent}  route ${match.join(" | ")} -> ${r.spoke}`);
      });
      return;
    }
    default:
      assertNever(node);
  }
}

/** Indented tree of the graph, one node per line, followed by build notes. */
export function describeGraph(graph: ExecutionGraph): string {
  const out = [`${graph.name} (${graph.executionType})`];
  describeNode(graph.root, "  ", out);
  for (const note of graph.notes) out.push(`  note: ${note}`);
  return out.join("\n");
}
