import { pathToFileURL } from "url";
import { XMLParser } from "fast-xml-parser";
import { CIRCUIT_MODEL_TYPES, CircuitLibrary, GATE_KINDS, type CircuitModelId, type CircuitModelType, type GateKind } from "./circuit_library.js";
import { parseSramOrganization, type Coordinate, type SramOrganization } from "./fabric_types.js";
import { PbTypeGraph, type ModeId, type PbTypePort } from "./pb_type_graph.js";
import { asArray, die, isRecord, readText } from "./util.js";

type XmlNode = Record<string, unknown>;

export type Segment = {
  name: string;
  wireModel: CircuitModelId;
};

export type FabricArchitecture = {
  circuitLib: CircuitLibrary;
  pbGraph: PbTypeGraph;
  sramOrganization: SramOrganization;
  sramModel: CircuitModelId;
  deviceSize: Coordinate;
  perimeterBlock: string | null;
  cornerBlock: string | null;
  fillBlock: string | null;
  segments: Segment[];
};

function children(node: XmlNode | undefined, key: string): XmlNode[] {
  if (!node) return [];
  return asArray<unknown>(node[key]).filter(isRecord);
}

function child(node: XmlNode | undefined, key: string): XmlNode | undefined {
  return children(node, key)[0];
}

function attr(node: XmlNode, name: string): string | undefined {
  const v = node[`@_${name}`];
  if (typeof v === "string") return v.trim();
  if (typeof v === "number") return String(v);
  return undefined;
}

function requireAttr(node: XmlNode, name: string, where: string): string {
  const v = attr(node, name);
  if (v === undefined || v.length === 0) die(`${where}: missing attribute '${name}'`);
  return v;
}

function requireCount(node: XmlNode, name: string, where: string): number {
  const raw = requireAttr(node, name, where);
  const n = Number(raw);
  if (!Number.isSafeInteger(n) || n < 0) die(`${where}: '${name}' must be a non-negative integer, got '${raw}'`);
  return n;
}

function modelType(s: string, where: string): CircuitModelType {
  return CIRCUIT_MODEL_TYPES.find((t) => t === s.toLowerCase()) ?? die(`${where}: unknown circuit model type '${s}'`);
}

function gateKind(s: string, where: string): GateKind {
  return GATE_KINDS.find((g) => g === s.toUpperCase()) ?? die(`${where}: unknown gate topology '${s}'`);
}

function parseCircuitLibrary(root: XmlNode): CircuitLibrary {
  const lib = new CircuitLibrary();
  const models = children(child(root, "circuit_library"), "circuit_model");
  const passGates: Array<[CircuitModelId, string]> = [];
  for (const m of models) {
    const name = requireAttr(m, "name", "circuit_model");
    const where = `circuit_model '${name}'`;
    if (lib.findModel(name) !== undefined) die(`${where}: defined twice`);
    const type = modelType(requireAttr(m, "type", where), where);
    const tech = child(m, "design_technology");
    const topology = tech ? attr(tech, "topology") : undefined;
    const id = lib.addModel({
      name,
      type,
      gateKind: type === "gate" ? gateKind(topology ?? die(`${where}: gate needs a design_technology topology`), where) : undefined,
    });
    const pg = child(m, "pass_gate_logic");
    if (pg) passGates.push([id, requireAttr(pg, "circuit_model_name", `${where} pass_gate_logic`)]);
  }
  for (const [id, ref] of passGates) {
    const target = lib.findModel(ref) ?? die(`circuit_model '${lib.modelName(id)}': pass_gate_logic refers to unknown model '${ref}'`);
    lib.setPassGateLogicModel(id, target);
  }
  return lib;
}

function parsePbType(graph: PbTypeGraph, node: XmlNode, parentMode: ModeId | null): void {
  const name = requireAttr(node, "name", "pb_type");
  const id = graph.addPbType(name, parentMode);
  for (const kind of ["input", "output", "clock"] as const) {
    for (const p of children(node, kind)) {
      const where = `pb_type '${name}' ${kind}`;
      const port: PbTypePort = {
        name: requireAttr(p, "name", where),
        kind,
        numPins: requireCount(p, "num_pins", where),
        parentPbType: id,
      };
      graph.addPort(port);
    }
  }
  for (const mode of children(node, "mode")) {
    const modeId = graph.addMode(requireAttr(mode, "name", `pb_type '${name}' mode`), id);
    for (const sub of children(mode, "pb_type")) parsePbType(graph, sub, modeId);
  }
}

function lookupModel(lib: CircuitLibrary, name: string, where: string): CircuitModelId {
  return lib.findModel(name) ?? die(`${where}: unknown circuit model '${name}'`);
}

export function parseArchitecture(text: string): FabricArchitecture {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
  });
  const doc: unknown = parser.parse(text);
  const root = isRecord(doc) && isRecord(doc.architecture) ? doc.architecture : die("missing <architecture> root element");

  const circuitLib = parseCircuitLibrary(root);

  const org = child(child(root, "configuration_protocol"), "organization") ?? die("missing <configuration_protocol><organization>");
  const orgType = requireAttr(org, "type", "organization");
  const sramOrganization = parseSramOrganization(orgType) ?? die(`organization: unknown type '${orgType}'`);
  const sramModel = lookupModel(circuitLib, requireAttr(org, "circuit_model_name", "organization"), "organization");

  const layout = child(child(root, "layout"), "fixed_layout") ?? die("missing <layout><fixed_layout>");
  const deviceSize = { x: requireCount(layout, "width", "fixed_layout"), y: requireCount(layout, "height", "fixed_layout") };
  const blockOf = (key: string): string | null => {
    const el = child(layout, key);
    const type = el ? attr(el, "type") : undefined;
    return type && type.toUpperCase() !== "EMPTY" ? type : null;
  };

  const segments = children(child(root, "segmentlist"), "segment").map((s) => {
    const name = requireAttr(s, "name", "segment");
    return { name, wireModel: lookupModel(circuitLib, requireAttr(s, "circuit_model_name", `segment '${name}'`), `segment '${name}'`) };
  });

  const pbGraph = new PbTypeGraph();
  for (const pb of children(child(root, "complexblocklist"), "pb_type")) parsePbType(pbGraph, pb, null);

  const arch: FabricArchitecture = {
    circuitLib,
    pbGraph,
    sramOrganization,
    sramModel,
    deviceSize,
    perimeterBlock: blockOf("perimeter"),
    cornerBlock: blockOf("corners"),
    fillBlock: blockOf("fill"),
    segments,
  };
  for (const block of [arch.perimeterBlock, arch.cornerBlock, arch.fillBlock]) {
    if (block !== null && pbGraph.findRootPbType(block) === undefined) die(`fixed_layout: block type '${block}' is not a top-level pb_type`);
  }
  return arch;
}

export function loadArchitecture(archPath: string): FabricArchitecture {
  return parseArchitecture(readText(archPath));
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 3) {
  const arch = loadArchitecture(process.argv[2] ?? "");
  const lib = arch.circuitLib;
  const summary = {
    circuit_models: lib.modelIds().map((id) => ({ name: lib.modelName(id), type: lib.modelType(id) })),
    sram_organization: arch.sramOrganization,
    sram_model: lib.modelName(arch.sramModel),
    device_size: arch.deviceSize,
    pb_types: arch.pbGraph.pbTypeIds().map((id) => arch.pbGraph.pbTypeName(id)),
    segments: arch.segments.map((s) => s.name),
  };
  console.error(`arch_parse: models=${summary.circuit_models.length} pb_types=${summary.pb_types.length}`);
  process.stdout.write(JSON.stringify(summary, null, 2));
}
