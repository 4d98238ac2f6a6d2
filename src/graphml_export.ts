import { XMLBuilder } from "fast-xml-parser";
import type { Container } from "./container.js";
import type { ConnectionPoint } from "./node.js";
import { defaultRules, type ElaborationRules } from "./rules.js";
import type { Dict } from "./util.js";

export type GraphmlRules = ElaborationRules["graphml"];

const HEADER = '<?xml version="1.0" encoding="UTF-8"?>\n';

const KEYS: Dict[] = [
  { "@_for": "node", "@_id": "n", "@_yfiles.type": "nodegraphics" },
  { "@_for": "edge", "@_id": "e", "@_yfiles.type": "edgegraphics" },
  { "@_for": "node", "@_id": "d", "@_attr.name": "Description", "@_attr.type": "string" },
];

export function nodeId(n: ConnectionPoint): string {
  return `${n.owner.index}::${n.serial}`;
}

function visibleChildren(c: Container, rules: GraphmlRules): Container[] {
  return c.children.filter((x) => rules.include_omitted || !x.omitGraphML);
}

function visibleNodes(c: Container, rules: GraphmlRules): ConnectionPoint[] {
  return c.nodes.filter((n) => rules.include_omitted || !n.omitGraphML);
}

function pointXml(n: ConnectionPoint): Dict {
  return {
    "@_id": nodeId(n),
    data: [
      { "@_key": "e", "y:ShapeNode": { "y:Shape": { "@_type": "Ellipse" } } },
      { "@_key": "d", "#text": n.describe() },
    ],
  };
}

function containerXml(c: Container, rules: GraphmlRules): Dict {
  return {
    "@_id": String(c.index),
    data: [
      {
        "@_key": "n",
        "y:ShapeNode": {
          "y:NodeLabel": {
            "@_modelName": "sides",
            "@_modelPosition": "w",
            "@_rotationAngle": "270.0",
            "#text": c.instanceName,
          },
        },
      },
      { "@_key": "d", "#text": `${c.moduleName} (${c.pathName})` },
    ],
    graph: {
      "@_id": `${c.index}::`,
      "@_edgedefault": "directed",
      node: [
        ...visibleNodes(c, rules).map(pointXml),
        ...visibleChildren(c, rules).map((x) => containerXml(x, rules)),
      ],
    },
  };
}

function edgesXml(c: Container, rules: GraphmlRules, out: Dict[]): void {
  for (const n of visibleNodes(c, rules)) {
    for (const { target, edge } of n.outputs()) {
      if (!rules.include_omitted && target.omitGraphML) continue;
      const [source, sink] = edge.flipped ? [nodeId(target), nodeId(n)] : [nodeId(n), nodeId(target)];
      out.push({
        "@_source": source,
        "@_target": sink,
        data: {
          "@_key": "e",
          "y:PolyLineEdge": {
            "y:Arrows": edge.flipped
              ? { "@_source": "standard", "@_target": "none" }
              : { "@_source": "none", "@_target": "standard" },
            "y:LineStyle": { "@_color": edge.colour ?? rules.edge_colour, "@_type": "line", "@_width": "1.0" },
            "y:EdgeLabel": { "@_modelName": "centered", "@_rotationAngle": "270.0", "#text": edge.label },
          },
        },
      });
    }
  }
  for (const x of visibleChildren(c, rules)) edgesXml(x, rules, out);
}

/** Renders an instantiated tree as nested yEd-flavoured GraphML. Reads, never mutates. */
export function exportGraphML(root: Container, rules: GraphmlRules = defaultRules.graphml): string {
  const edges: Dict[] = [];
  edgesXml(root, rules, edges);
  const doc = {
    graphml: {
      "@_xmlns": "http://graphml.graphdrawing.org/xmlns",
      "@_xmlns:y": "http://www.yworks.com/xml/graphml",
      key: KEYS,
      graph: {
        "@_id": "G",
        "@_edgedefault": "directed",
        node: [containerXml(root, rules)],
        edge: edges,
      },
    },
  };
  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    format: true,
    indentBy: "  ",
    suppressEmptyNode: true,
  });
  return HEADER + builder.build(doc);
}
