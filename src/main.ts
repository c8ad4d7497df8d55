#!/usr/bin/env node
import fs from "fs";
import { loadArchitecture } from "./arch_parse.js";
import { ContractViolation, describeViolation } from "./contract.js";
import { buildNameReport } from "./name_report.js";
import { loadNameRules, outputPath } from "./output_options.js";
import { writeText } from "./util.js";

async function main() {
  const [archPath, rulesPath, outJson] = process.argv.slice(2);
  if (!archPath || !rulesPath) {
    console.error("Usage: node dist/main.js <arch.xml> <names.yaml> [out.json]");
    process.exit(1);
  }
  const rules = loadNameRules(rulesPath);
  const verbose = rules.output.verbose_output;
  const arch = loadArchitecture(archPath);
  if (verbose) {
    const lib = arch.circuitLib;
    console.error(`Architecture: ${lib.modelIds().length} circuit models, ${arch.pbGraph.pbTypeIds().length} pb_types`);
    console.error(`Device: ${arch.deviceSize.x}x${arch.deviceSize.y}, SRAM organization: ${arch.sramOrganization}`);
  }

  const report = buildNameReport(arch, rules.output, rules.report);

  const dest = outJson ?? outputPath(rules.output, "fabric_names.json");
  if (!outJson) fs.mkdirSync(rules.output.output_directory, { recursive: true });
  writeText(dest, JSON.stringify(report, null, 2));
  console.error(`Name report: ${dest}`);
  if (verbose) {
    console.error(`Grids: ${report.grids.length} modules, physical blocks: ${report.physical_blocks.length}`);
    console.error(`Routing (${report.routing.addressing}): ${report.routing.chanx.length + report.routing.chany.length} channels, ${report.routing.sb.length} switch blocks`);
  }
}

main().catch((e: unknown) => {
  if (e instanceof ContractViolation) {
    console.error(`Naming contract violation: ${describeViolation(e)}`);
  } else {
    console.error(e);
  }
  process.exit(1);
});
