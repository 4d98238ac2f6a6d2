import fs from "fs";
import { pathToFileURL } from "url";
import { XMLParser } from "fast-xml-parser";
import { type Dict, type FlatGraph, type GraphEdge, type GraphNode, asArray, isRecord } from "./util.js";

function extractText(val: unknown): string | undefined {
  if (val === undefined || val === null) return undefined;
  if (typeof val === "string" || typeof val === "number" || typeof val === "boolean") {
    return String(val);
  }
  if (isRecord(val) && val["#text"] !== undefined && val["#text"] !== null) {
    return String(val["#text"]);
  }
  return undefined;
}

function findLabelDeep(val: unknown): string | undefined {
  if (!isRecord(val)) return undefined;
  for (const key of ["y:NodeLabel", "y:EdgeLabel", "y:Label"]) {
    if (val[key] !== undefined) {
      const label = extractText(val[key]);
      if (label) return label;
    }
  }
  for (const [k, v] of Object.entries(val)) {
    if (k.startsWith("@_") || k === "#text") continue;
    const nested = findLabelDeep(v);
    if (nested) return nested;
  }
  return undefined;
}

function extractLabel(dataItems: unknown[]): string | undefined {
  for (const d of dataItems) {
    const label = findLabelDeep(d);
    if (label) return label;
  }
  return undefined;
}

function extractAttrs(dataItems: unknown[], keyMap: Record<string, string>): Record<string, string> {
  const attrs: Record<string, string> = {};
  for (const d of dataItems) {
    if (!isRecord(d)) continue;
    const key = extractText(d["@_key"]);
    const value = extractText(d);
    if (key && value !== undefined) {
      attrs[keyMap[key] ?? key] = value;
    }
  }
  return attrs;
}

function parseNode(n: Dict, keyMap: Record<string, string>, parent: string | undefined): GraphNode {
  const id = extractText(n["@_id"]) ?? "";
  const dataItems = asArray<unknown>(n.data);
  const attrs = extractAttrs(dataItems, keyMap);
  const label = extractLabel(dataItems) ?? attrs.Description;
  return parent === undefined ? { id, label, attrs } : { id, label, attrs, parent };
}

function parseEdge(e: Dict, keyMap: Record<string, string>): GraphEdge {
  const dataItems = asArray<unknown>(e.data);
  return {
    id: extractText(e["@_id"]),
    source: extractText(e["@_source"]) ?? "",
    target: extractText(e["@_target"]) ?? "",
    label: extractLabel(dataItems),
    attrs: extractAttrs(dataItems, keyMap),
  };
}

/** Flattens a (possibly nested) GraphML document; nested nodes remember their enclosing node. */
export function parseGraphml(text: string): FlatGraph {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
  });
  const doc: unknown = parser.parse(text);
  const graphml = isRecord(doc) ? doc.graphml : undefined;
  if (!isRecord(graphml)) {
    return { nodes: [], edges: [] };
  }

  const keyMap: Record<string, string> = {};
  for (const k of asArray<unknown>(graphml.key)) {
    if (!isRecord(k)) continue;
    const keyId = extractText(k["@_id"]);
    const attrName = extractText(k["@_attr.name"]);
    if (keyId && attrName) {
      keyMap[keyId] = attrName;
    }
  }

  const nodeMap = new Map<string, GraphNode>();
  const edgeMap = new Map<string, GraphEdge>();

  const visitGraph = (g: unknown, parent: string | undefined): void => {
    if (!isRecord(g)) return;
    for (const n of asArray<unknown>(g.node)) {
      if (!isRecord(n)) continue;
      const parsed = parseNode(n, keyMap, parent);
      if (parsed.id) nodeMap.set(parsed.id, parsed);
      for (const nested of asArray<unknown>(n.graph)) {
        visitGraph(nested, parsed.id || parent);
      }
    }
    for (const e of asArray<unknown>(g.edge)) {
      if (!isRecord(e)) continue;
      const parsed = parseEdge(e, keyMap);
      if (!parsed.source || !parsed.target) continue;
      const key = parsed.id ?? `${parsed.source}->${parsed.target}::${parsed.label ?? ""}`;
      edgeMap.set(key, parsed);
    }
  };

  for (const g of asArray<unknown>(graphml.graph)) visitGraph(g, undefined);
  return { nodes: Array.from(nodeMap.values()), edges: Array.from(edgeMap.values()) };
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 4) {
  const input = process.argv[2];
  const output = process.argv[3];
  if (!input || !output) {
    console.error("Usage: node dist/graphml_parse.js <in.graphml> <out.json>");
    process.exit(1);
  }
  const graph = parseGraphml(fs.readFileSync(input, "utf8"));
  fs.writeFileSync(output, JSON.stringify(graph, null, 2), "utf8");
  console.error(`graphml_parse: nodes=${graph.nodes.length} edges=${graph.edges.length}`);
}
