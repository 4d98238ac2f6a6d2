export { AutoBundle, direction, disambiguateNames, trimNumericSuffix } from "./auto_bundle.js";
export type { BundleElement, BundleInput, PortDirection } from "./auto_bundle.js";
export { Container, SimpleContainer } from "./container.js";
export type { InstanceResult, InstantiationState } from "./container.js";
export { boundaryReport, declareDesign, DesignContainer, loadDesign, parseDesign } from "./design.js";
export type { BoundaryReport, ContainerSpec, LinkSpec, PointSpec, PortSummary } from "./design.js";
export { Elaboration, collectStats } from "./elaboration.js";
export type { ElaborationResult, ElaborationStats, WarnFn } from "./elaboration.js";
export * from "./errors.js";
export { exportGraphML } from "./graphml_export.js";
export { parseGraphml } from "./graphml_parse.js";
export { compareHalfEdge, groupBySource, halfEdge, halfEdgeKey, pairDangles } from "./half_edge.js";
export type { DanglingEnd, HalfEdge, Pairing, ResolvedLink } from "./half_edge.js";
export { ModuleValue } from "./module_value.js";
export { BaseNode } from "./node.js";
export type { ConnectionPoint, NodeOutput, RenderedEdge } from "./node.js";
export { defaultRules, loadRules, mergeRules } from "./rules.js";
export type { ElaborationRules, UnresolvedRootPolicy } from "./rules.js";
export { ScopeStack } from "./scope.js";
export { SimpleNode } from "./simple_node.js";
export type { NodeDirection, SimpleNodeOptions } from "./simple_node.js";
export { Wire } from "./signal.js";
export type { Signal } from "./signal.js";
