import { violate } from "./contract.js";
import type { CircuitLibrary, CircuitModelId } from "./circuit_library.js";
import type { SpicePortKind, SramOrganization } from "./fabric_types.js";
import { SEP } from "./identifier.js";

type PortTokens = ReadonlyMap<SpicePortKind, string>;

/*
 *   standalone   input -> <sram>_out, output -> <sram>_outb
 *   scan_chain   input -> <sram>_ccff_head, output -> <sram>_ccff_tail
 *
 *            +------+    +------+    +------+
 *   head --->| CCFF |--->| CCFF |--->| CCFF |---> tail
 *            +------+    +------+    +------+
 *
 *   memory_bank  bl/wl/blb/wlb -> <sram>_bl, _wl, _blb, _wlb
 */
const EXTERNAL_TOKENS: Record<SramOrganization, PortTokens> = {
  standalone: new Map<SpicePortKind, string>([
    ["input", "out"],
    ["output", "outb"],
  ]),
  scan_chain: new Map<SpicePortKind, string>([
    ["input", "ccff_head"],
    ["output", "ccff_tail"],
  ]),
  memory_bank: new Map<SpicePortKind, string>([
    ["bl", "bl"],
    ["wl", "wl"],
    ["blb", "blb"],
    ["wlb", "wlb"],
  ]),
};

// The scan chain also carries the inverted output locally.
const LOCAL_BUS_TOKENS: PortTokens = new Map<SpicePortKind, string>([
  ["input", "out_local_bus"],
  ["output", "outb_local_bus"],
]);

const LOCAL_TOKENS: Record<SramOrganization, PortTokens> = {
  standalone: LOCAL_BUS_TOKENS,
  scan_chain: new Map<SpicePortKind, string>([
    ["input", "ccff_in_local_bus"],
    ["output", "ccff_out_local_bus"],
    ["inout", "ccff_outb_local_bus"],
  ]),
  memory_bank: LOCAL_BUS_TOKENS,
};

function tokensFor(table: Record<SramOrganization, PortTokens>, org: SramOrganization): PortTokens {
  switch (org) {
    case "standalone":
    case "scan_chain":
    case "memory_bank":
      return table[org];
    default:
      return violate(`invalid SRAM organization '${String(org)}'`, { sramOrganization: String(org) });
  }
}

function kindsOf(table: Record<SramOrganization, PortTokens>): Record<SramOrganization, readonly SpicePortKind[]> {
  return {
    standalone: Array.from(table.standalone.keys()),
    scan_chain: Array.from(table.scan_chain.keys()),
    memory_bank: Array.from(table.memory_bank.keys()),
  };
}

export const SRAM_PORT_KINDS = kindsOf(EXTERNAL_TOKENS);

export const SRAM_LOCAL_PORT_KINDS = kindsOf(LOCAL_TOKENS);

function sramPort(lib: CircuitLibrary, sramModel: CircuitModelId, org: SramOrganization, portType: SpicePortKind, tokens: PortTokens, scope: string): string {
  const name = lib.modelName(sramModel);
  const token = tokens.get(portType);
  if (token === undefined) {
    return violate(`port type '${String(portType)}' is not available for ${scope} SRAM ports of a ${org} organization`, {
      sramModel: name,
      sramOrganization: org,
      portType: String(portType),
    });
  }
  return `${name}${SEP}${token}`;
}

export function generateSramPortName(lib: CircuitLibrary, sramModel: CircuitModelId, org: SramOrganization, portType: SpicePortKind): string {
  return sramPort(lib, sramModel, org, portType, tokensFor(EXTERNAL_TOKENS, org), "module");
}

export function generateSramLocalPortName(lib: CircuitLibrary, sramModel: CircuitModelId, org: SramOrganization, portType: SpicePortKind): string {
  return sramPort(lib, sramModel, org, portType, tokensFor(LOCAL_TOKENS, org), "local");
}

// Reserved BLB/WL ports of resistive-memory fabrics.
export function generateReservedSramPortName(portType: SpicePortKind): string {
  if (portType === "blb") return "reserved_blb";
  if (portType === "wl") return "reserved_wl";
  return violate(`reserved SRAM port must be blb or wl, got '${portType}'`, { portType });
}

export function generateFormalVerificationSramPortName(lib: CircuitLibrary, sramModel: CircuitModelId): string {
  return `${lib.modelName(sramModel)}_out_fm`;
}

export function generateConfigurationChainHeadName(): string {
  return "ccff_head";
}

export function generateConfigurationChainTailName(): string {
  return "ccff_tail";
}

export function generateConfigurationChainDataOutName(): string {
  return "mem_out";
}

export function generateConfigurationChainInvertedDataOutName(): string {
  return "mem_outb";
}

export function generateMuxLocalDecoderAddrPortName(): string {
  return "addr";
}

export function generateMuxLocalDecoderDataPortName(): string {
  return "data";
}

export function generateMuxLocalDecoderDataInvPortName(): string {
  return "data_inv";
}

export function generateLocalConfigBusPortName(): string {
  return "config_bus";
}
