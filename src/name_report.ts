import type { FabricArchitecture } from "./arch_parse.js";
import {
  findGridBorderSide,
  generateFpgaGlobalIoPortName,
  generateFpgaTopModuleName,
  generateFpgaTopNetlistName,
  generateGridBlockModuleName,
  generateGridBlockNetlistName,
  generateGridPhysicalBlockModuleName,
  generatePbTypePortName,
  generatePhysicalBlockModuleName,
} from "./block_naming.js";
import {
  generateConstValueModuleName,
  generateConstValueModuleOutputPortName,
  generateMemoryModuleName,
  generateMuxBranchSubcktName,
  generateMuxInputBusPortName,
  generateMuxLocalDecoderSubcktName,
  generateMuxSramPortName,
  generateMuxSubcktName,
  generateSegmentWireMidOutputName,
  generateSegmentWireSubcktName,
} from "./circuit_model_naming.js";
import { violate } from "./contract.js";
import type { Coordinate, RrType, Side, SpicePortKind } from "./fabric_types.js";
import type { FabricOutputOption, ReportRules } from "./output_options.js";
import {
  generateConnectionBlockModuleName,
  generateConnectionBlockNetlistName,
  generateRoutingChannelModuleName,
  generateRoutingTrackMiddleOutputPortName,
  generateRoutingTrackPortName,
  generateSwitchBlockModuleName,
} from "./routing_naming.js";
import {
  SRAM_LOCAL_PORT_KINDS,
  SRAM_PORT_KINDS,
  generateConfigurationChainDataOutName,
  generateConfigurationChainHeadName,
  generateConfigurationChainInvertedDataOutName,
  generateConfigurationChainTailName,
  generateLocalConfigBusPortName,
  generateMuxLocalDecoderAddrPortName,
  generateMuxLocalDecoderDataInvPortName,
  generateMuxLocalDecoderDataPortName,
  generateSramLocalPortName,
  generateSramPortName,
} from "./sram_naming.js";

type MuxEntry = {
  model: string;
  size: number;
  subckt: string;
  branch: string;
  memory: string;
  decoder: string;
  input_bus: string;
  sram_ports: string[];
};

type GridEntry = {
  block: string;
  side: Side | null;
  module: string;
  netlist: string;
  physical_module: string;
  locations: Coordinate[];
};

type ChannelEntry = {
  x: number;
  y: number;
  module: string;
  ports: string[];
};

type BlockEntry = {
  x: number;
  y: number;
  module: string;
  netlist?: string;
};

export type NameReport = {
  top: { module: string; testbench: string; formal_verification: string; global_io_ports: string[] };
  options: FabricOutputOption;
  constants: Array<{ value: number; module: string; output_port: string }>;
  muxes: MuxEntry[];
  segments: Array<{ name: string; subckt: string; mid_output: string }>;
  sram: {
    organization: string;
    model: string;
    ports: Partial<Record<SpicePortKind, string>>;
    local_ports: Partial<Record<SpicePortKind, string>>;
    fixed_ports: Record<string, string>;
  };
  grids: GridEntry[];
  physical_blocks: Array<{ pb_type: string; module: string }>;
  pb_type_ports: string[];
  routing: {
    addressing: "coordinate" | "sequence";
    chanx: ChannelEntry[];
    chany: ChannelEntry[];
    sb: BlockEntry[];
    cbx: BlockEntry[];
    cby: BlockEntry[];
  };
};

export function assertUnique(names: string[], section: string): void {
  const seen = new Set<string>();
  for (const n of names) {
    if (seen.has(n)) violate(`duplicate name '${n}' in ${section}`, { section, name: n });
    seen.add(n);
  }
}

function log2Ceil(n: number): number {
  let bits = 0;
  for (let span = 1; span < n; span *= 2) bits += 1;
  return Math.max(1, bits);
}

function muxEntries(arch: FabricArchitecture, sizes: number[]): MuxEntry[] {
  const lib = arch.circuitLib;
  const out: MuxEntry[] = [];
  for (const id of [...lib.modelsOfType("mux"), ...lib.modelsOfType("lut")]) {
    const isLut = lib.modelType(id) === "lut";
    // A LUT multiplexer name does not depend on its size.
    for (const size of isLut ? sizes.slice(0, 1) : sizes) {
      out.push({
        model: lib.modelName(id),
        size,
        subckt: generateMuxSubcktName(lib, id, size, ""),
        branch: generateMuxBranchSubcktName(lib, id, size, 2, ""),
        memory: generateMemoryModuleName(lib, id, arch.sramModel, isLut ? "" : `_size${size}`),
        decoder: generateMuxLocalDecoderSubcktName(log2Ceil(size), size),
        input_bus: generateMuxInputBusPortName(lib, id, size, 0),
        sram_ports: (["input", "output"] as const).map((kind) => generateMuxSramPortName(lib, id, size, 0, kind)),
      });
    }
  }
  assertUnique(out.map((m) => m.subckt), "mux subcircuits");
  return out;
}

function sramSection(arch: FabricArchitecture): NameReport["sram"] {
  const lib = arch.circuitLib;
  const org = arch.sramOrganization;
  const ports: Partial<Record<SpicePortKind, string>> = {};
  for (const kind of SRAM_PORT_KINDS[org]) ports[kind] = generateSramPortName(lib, arch.sramModel, org, kind);
  const localPorts: Partial<Record<SpicePortKind, string>> = {};
  for (const kind of SRAM_LOCAL_PORT_KINDS[org]) localPorts[kind] = generateSramLocalPortName(lib, arch.sramModel, org, kind);
  return {
    organization: org,
    model: lib.modelName(arch.sramModel),
    ports,
    local_ports: localPorts,
    fixed_ports: {
      ccff_head: generateConfigurationChainHeadName(),
      ccff_tail: generateConfigurationChainTailName(),
      mem_out: generateConfigurationChainDataOutName(),
      mem_outb: generateConfigurationChainInvertedDataOutName(),
      decoder_addr: generateMuxLocalDecoderAddrPortName(),
      decoder_data: generateMuxLocalDecoderDataPortName(),
      decoder_data_inv: generateMuxLocalDecoderDataInvPortName(),
      config_bus: generateLocalConfigBusPortName(),
    },
  };
}

function blockAt(arch: FabricArchitecture, c: Coordinate): { block: string | null; side: Side | null } {
  const { x: w, y: h } = arch.deviceSize;
  const onX = c.x === 0 || c.x === w - 1;
  const onY = c.y === 0 || c.y === h - 1;
  if (onX && onY) return { block: arch.cornerBlock, side: null };
  const side = findGridBorderSide(arch.deviceSize, c);
  if (side !== null) return { block: arch.perimeterBlock, side };
  return { block: arch.fillBlock, side: null };
}

function gridEntries(arch: FabricArchitecture, rules: ReportRules): GridEntry[] {
  const grids = new Map<string, GridEntry>();
  for (let y = 0; y < arch.deviceSize.y; y += 1) {
    for (let x = 0; x < arch.deviceSize.x; x += 1) {
      const { block, side } = blockAt(arch, { x, y });
      if (block === null) continue;
      const module = generateGridBlockModuleName(rules.grid_prefix, block, side);
      const existing = grids.get(module);
      if (existing) {
        existing.locations.push({ x, y });
        continue;
      }
      const root = arch.pbGraph.findRootPbType(block) ?? violate(`grid block '${block}' is not a top-level pb_type`, { block, x, y });
      grids.set(module, {
        block,
        side,
        module,
        netlist: generateGridBlockNetlistName(block, side, ""),
        physical_module: generateGridPhysicalBlockModuleName(arch.pbGraph, rules.grid_prefix, root, side),
        locations: [{ x, y }],
      });
    }
  }
  return Array.from(grids.values());
}

function channelEntries(kind: RrType, coords: Coordinate[], width: number, sequence: boolean): ChannelEntry[] {
  return coords.map((c, i) => {
    const ports: string[] = [];
    for (let t = 0; t < width; t += 1) {
      ports.push(generateRoutingTrackPortName(kind, c, t, "IN_PORT"));
      ports.push(generateRoutingTrackPortName(kind, c, t, "OUT_PORT"));
      ports.push(generateRoutingTrackMiddleOutputPortName(kind, c, t));
    }
    assertUnique(ports, `${kind} ${c.x},${c.y} ports`);
    return { x: c.x, y: c.y, module: generateRoutingChannelModuleName(kind, sequence ? i : c), ports };
  });
}

function range(lo: number, hi: number): number[] {
  const out: number[] = [];
  for (let i = lo; i <= hi; i += 1) out.push(i);
  return out;
}

function coordsIn(xs: number[], ys: number[]): Coordinate[] {
  return ys.flatMap((y) => xs.map((x) => ({ x, y })));
}

function routingSection(arch: FabricArchitecture, opts: FabricOutputOption, rules: ReportRules): NameReport["routing"] {
  const { x: w, y: h } = arch.deviceSize;
  const chanxCoords = coordsIn(range(1, w - 2), range(0, h - 2));
  const chanyCoords = coordsIn(range(0, w - 2), range(1, h - 2));
  const sbCoords = coordsIn(range(0, w - 2), range(0, h - 2));
  const sequence = opts.compress_routing;
  const chanx = channelEntries("CHANX", chanxCoords, rules.channel_width, sequence);
  const chany = channelEntries("CHANY", chanyCoords, rules.channel_width, sequence);
  const cb = (kind: RrType, c: Coordinate): BlockEntry => ({
    x: c.x,
    y: c.y,
    module: generateConnectionBlockModuleName(kind, c),
    netlist: generateConnectionBlockNetlistName(kind, c, "_"),
  });
  const routing: NameReport["routing"] = {
    addressing: sequence ? "sequence" : "coordinate",
    chanx,
    chany,
    sb: sbCoords.map((c) => ({ x: c.x, y: c.y, module: generateSwitchBlockModuleName(c) })),
    cbx: chanxCoords.map((c) => cb("CHANX", c)),
    cby: chanyCoords.map((c) => cb("CHANY", c)),
  };
  assertUnique([...chanx, ...chany].map((e) => e.module), "routing channels");
  assertUnique([...routing.sb, ...routing.cbx, ...routing.cby].map((e) => e.module), "routing blocks");
  return routing;
}

export function buildNameReport(arch: FabricArchitecture, opts: FabricOutputOption, rules: ReportRules): NameReport {
  const lib = arch.circuitLib;
  const graph = arch.pbGraph;

  const physicalBlocks = graph.pbTypeIds().map((id) => ({
    pb_type: graph.pbTypeName(id),
    module: generatePhysicalBlockModuleName(graph, rules.logical_tile_prefix, id),
  }));
  assertUnique(physicalBlocks.map((p) => p.module), "physical blocks");

  const pbTypePorts = graph.rootPbTypes().flatMap((id) => graph.portsOf(id).map((p) => generatePbTypePortName(graph, p)));
  assertUnique(pbTypePorts, "pb_type ports");

  const grids = gridEntries(arch, rules);
  assertUnique(grids.map((g) => g.physical_module), "grid physical blocks");

  const segments = arch.segments.map((s, i) => {
    const subckt = generateSegmentWireSubcktName(lib.modelName(s.wireModel), i);
    return { name: s.name, subckt, mid_output: generateSegmentWireMidOutputName(`${subckt}_out`) };
  });

  return {
    top: {
      module: generateFpgaTopModuleName(),
      testbench: generateFpgaTopNetlistName("_autocheck_top_tb"),
      formal_verification: generateFpgaTopNetlistName("_top_formal_verification"),
      global_io_ports: lib.modelsOfType("iopad").map((id) => generateFpgaGlobalIoPortName("gfpga_pad_", lib, id)),
    },
    options: opts,
    constants: [0, 1].map((value) => ({
      value,
      module: generateConstValueModuleName(value),
      output_port: generateConstValueModuleOutputPortName(value),
    })),
    muxes: muxEntries(arch, rules.mux_sizes),
    segments,
    sram: sramSection(arch),
    grids,
    physical_blocks: physicalBlocks,
    pb_type_ports: pbTypePorts,
    routing: routingSection(arch, opts, rules),
  };
}
