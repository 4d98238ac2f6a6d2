import fs from "fs";
import yaml from "js-yaml";
import { type Dict, isRecord } from "./util.js";

export type UnresolvedRootPolicy = "discard" | "warn" | "error";

export type ElaborationRules = {
  elaboration: {
    unresolved_roots: UnresolvedRootPolicy;
  };
  graphml: {
    include_omitted: boolean;
    edge_colour: string;
  };
};

export const defaultRules: ElaborationRules = {
  elaboration: {
    unresolved_roots: "discard",
  },
  graphml: {
    include_omitted: false,
    edge_colour: "#000000",
  },
};

function asPolicy(v: unknown): UnresolvedRootPolicy | undefined {
  return v === "discard" || v === "warn" || v === "error" ? v : undefined;
}

function asBool(v: unknown): boolean | undefined {
  return typeof v === "boolean" ? v : undefined;
}

function asColour(v: unknown): string | undefined {
  return typeof v === "string" && /^#[0-9a-fA-F]{3,8}$/.test(v) ? v : undefined;
}

/** Overlays whatever well-typed fields `rules` carries onto the defaults. */
export function mergeRules(rules: unknown): ElaborationRules {
  const root: Dict = isRecord(rules) ? rules : {};
  const elab: Dict = isRecord(root.elaboration) ? root.elaboration : {};
  const graphml: Dict = isRecord(root.graphml) ? root.graphml : {};
  return {
    elaboration: {
      unresolved_roots: asPolicy(elab.unresolved_roots) ?? defaultRules.elaboration.unresolved_roots,
    },
    graphml: {
      include_omitted: asBool(graphml.include_omitted) ?? defaultRules.graphml.include_omitted,
      edge_colour: asColour(graphml.edge_colour) ?? defaultRules.graphml.edge_colour,
    },
  };
}

export function loadRules(path: string): ElaborationRules {
  return mergeRules(yaml.load(fs.readFileSync(path, "utf8")));
}
