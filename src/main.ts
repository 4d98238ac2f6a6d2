#!/usr/bin/env node
import fs from "fs";
import { boundaryReport, declareDesign, loadDesign } from "./design.js";
import { Elaboration } from "./elaboration.js";
import { exportGraphML } from "./graphml_export.js";
import { defaultRules, loadRules } from "./rules.js";

function main(): void {
  const [designPath, outGraphml, rulesPath, outJson] = process.argv.slice(2);
  if (!designPath || !outGraphml) {
    console.error("Usage: node dist/main.js <design.yaml> <out.graphml> [rules.yaml] [out.json]");
    process.exit(1);
  }
  const rules = rulesPath ? loadRules(rulesPath) : defaultRules;
  const spec = loadDesign(designPath);
  const ctx = new Elaboration(rules);
  const root = declareDesign(ctx, spec, designPath);
  const result = ctx.elaborate(root);

  const graphml = exportGraphML(root, rules.graphml);
  fs.writeFileSync(outGraphml, graphml, "utf8");
  if (outJson) fs.writeFileSync(outJson, JSON.stringify(boundaryReport(root), null, 2), "utf8");

  const { containers, nodes, links, boundaryPorts } = result.stats;
  console.error(`Elaborated ${root.name}: containers=${containers} nodes=${nodes} links=${links} boundary_ports=${boundaryPorts}`);
  console.error(`Top ports: ${result.auto.names.join(", ") || "(none)"}`);
  console.error(`GraphML: ${outGraphml}`);
}

try {
  main();
} catch (e: unknown) {
  console.error(e instanceof Error ? e.message : String(e));
  process.exit(1);
}
