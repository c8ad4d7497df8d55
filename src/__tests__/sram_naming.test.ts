import { describe, it, expect } from "vitest";
import { CircuitLibrary } from "../circuit_library.js";
import { ContractViolation } from "../contract.js";
import { SPICE_PORT_KINDS, SRAM_ORGANIZATIONS, type SpicePortKind, type SramOrganization } from "../fabric_types.js";
import {
  SRAM_LOCAL_PORT_KINDS,
  SRAM_PORT_KINDS,
  generateConfigurationChainDataOutName,
  generateConfigurationChainHeadName,
  generateConfigurationChainInvertedDataOutName,
  generateConfigurationChainTailName,
  generateFormalVerificationSramPortName,
  generateLocalConfigBusPortName,
  generateMuxLocalDecoderAddrPortName,
  generateMuxLocalDecoderDataInvPortName,
  generateMuxLocalDecoderDataPortName,
  generateReservedSramPortName,
  generateSramLocalPortName,
  generateSramPortName,
} from "../sram_naming.js";

type PortTable = Record<SramOrganization, Partial<Record<SpicePortKind, string>>>;

const externalPorts: PortTable = {
  standalone: { input: "sram6t_out", output: "sram6t_outb" },
  scan_chain: { input: "sram6t_ccff_head", output: "sram6t_ccff_tail" },
  memory_bank: { bl: "sram6t_bl", wl: "sram6t_wl", blb: "sram6t_blb", wlb: "sram6t_wlb" },
};

const localPorts: PortTable = {
  standalone: { input: "sram6t_out_local_bus", output: "sram6t_outb_local_bus" },
  scan_chain: { input: "sram6t_ccff_in_local_bus", output: "sram6t_ccff_out_local_bus", inout: "sram6t_ccff_outb_local_bus" },
  memory_bank: { input: "sram6t_out_local_bus", output: "sram6t_outb_local_bus" },
};

function fromJson<T>(text: string): T {
  return JSON.parse(text);
}

function makeLibrary() {
  const lib = new CircuitLibrary();
  const sram = lib.addModel({ name: "sram6t", type: "sram" });
  return { lib, sram };
}

describe("generateSramPortName", () => {
  const { lib, sram } = makeLibrary();

  for (const org of SRAM_ORGANIZATIONS) {
    for (const kind of SPICE_PORT_KINDS) {
      const expected = externalPorts[org][kind];
      if (expected !== undefined) {
        it(`${org} ${kind} -> ${expected}`, () => {
          expect(generateSramPortName(lib, sram, org, kind)).toBe(expected);
        });
      } else {
        it(`${org} rejects ${kind}`, () => {
          expect(() => generateSramPortName(lib, sram, org, kind)).toThrow(ContractViolation);
        });
      }
    }
  }

  it("reports the organization and port kind of a rejected pair", () => {
    try {
      generateSramPortName(lib, sram, "standalone", "bl");
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ContractViolation);
      if (e instanceof ContractViolation) {
        expect(e.context).toEqual({ sramModel: "sram6t", sramOrganization: "standalone", portType: "bl" });
      }
    }
  });

  it("rejects port kinds that only exist as object properties", () => {
    for (const org of SRAM_ORGANIZATIONS) {
      expect(() => generateSramPortName(lib, sram, org, fromJson<SpicePortKind>('"constructor"'))).toThrow(ContractViolation);
      expect(() => generateSramPortName(lib, sram, org, fromJson<SpicePortKind>('"toString"'))).toThrow(ContractViolation);
    }
  });

  it("rejects an unknown organization", () => {
    expect(() => generateSramPortName(lib, sram, fromJson<SramOrganization>('"constructor"'), "input")).toThrow(ContractViolation);
  });

  it("lists the accepted kinds per organization", () => {
    expect(SRAM_PORT_KINDS.standalone).toEqual(["input", "output"]);
    expect(SRAM_PORT_KINDS.scan_chain).toEqual(["input", "output"]);
    expect(SRAM_PORT_KINDS.memory_bank).toEqual(["bl", "wl", "blb", "wlb"]);
  });
});

describe("generateSramLocalPortName", () => {
  const { lib, sram } = makeLibrary();

  for (const org of SRAM_ORGANIZATIONS) {
    for (const kind of SPICE_PORT_KINDS) {
      const expected = localPorts[org][kind];
      if (expected !== undefined) {
        it(`${org} ${kind} -> ${expected}`, () => {
          expect(generateSramLocalPortName(lib, sram, org, kind)).toBe(expected);
        });
      } else {
        it(`${org} rejects ${kind}`, () => {
          expect(() => generateSramLocalPortName(lib, sram, org, kind)).toThrow(ContractViolation);
        });
      }
    }
  }

  it("rejects port kinds that only exist as object properties", () => {
    for (const org of SRAM_ORGANIZATIONS) {
      expect(() => generateSramLocalPortName(lib, sram, org, fromJson<SpicePortKind>('"toString"'))).toThrow(ContractViolation);
      expect(() => generateSramLocalPortName(lib, sram, org, fromJson<SpicePortKind>('"hasOwnProperty"'))).toThrow(ContractViolation);
    }
  });

  it("lists the accepted kinds per organization", () => {
    expect(SRAM_LOCAL_PORT_KINDS.scan_chain).toEqual(["input", "output", "inout"]);
    expect(SRAM_LOCAL_PORT_KINDS.memory_bank).toEqual(["input", "output"]);
  });
});

describe("reserved and fixed ports", () => {
  it("names the reserved BLB and WL ports", () => {
    expect(generateReservedSramPortName("blb")).toBe("reserved_blb");
    expect(generateReservedSramPortName("wl")).toBe("reserved_wl");
    expect(() => generateReservedSramPortName("bl")).toThrow(ContractViolation);
  });

  it("names the formal verification port after the SRAM model", () => {
    const { lib, sram } = makeLibrary();
    expect(generateFormalVerificationSramPortName(lib, sram)).toBe("sram6t_out_fm");
  });

  it("returns the fixed configuration tokens", () => {
    expect(generateConfigurationChainHeadName()).toBe("ccff_head");
    expect(generateConfigurationChainTailName()).toBe("ccff_tail");
    expect(generateConfigurationChainDataOutName()).toBe("mem_out");
    expect(generateConfigurationChainInvertedDataOutName()).toBe("mem_outb");
    expect(generateMuxLocalDecoderAddrPortName()).toBe("addr");
    expect(generateMuxLocalDecoderDataPortName()).toBe("data");
    expect(generateMuxLocalDecoderDataInvPortName()).toBe("data_inv");
    expect(generateLocalConfigBusPortName()).toBe("config_bus");
  });
});
