export type GraphNode = {
  id: string;
  label?: string;
  attrs?: Record<string, string>;
  parent?: string;
};

export type GraphEdge = {
  id?: string;
  source: string;
  target: string;
  label?: string;
  attrs?: Record<string, string>;
};

export type FlatGraph = {
  nodes: GraphNode[];
  edges: GraphEdge[];
};

export type Dict = Record<string, unknown>;

export function isRecord(v: unknown): v is Dict {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function asArray<T>(v: T | T[] | undefined | null): T[] {
  if (v === undefined || v === null) return [];
  return Array.isArray(v) ? v : [v];
}

export function asNum(v: unknown): number | undefined {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string" && v.trim().length > 0) {
    const n = Number(v);
    if (Number.isFinite(n)) return n;
  }
  return undefined;
}
