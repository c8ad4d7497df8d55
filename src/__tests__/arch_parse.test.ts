import { fileURLToPath } from "url";
import { describe, it, expect } from "vitest";
import { loadArchitecture, parseArchitecture } from "../arch_parse.js";

const demoArch = fileURLToPath(new URL("../../arch/k4_n2_demo.xml", import.meta.url));

function archWith(circuitModels: string, extra = ""): string {
  return `<architecture>
  <circuit_library>${circuitModels}</circuit_library>
  <configuration_protocol><organization type="standalone" circuit_model_name="sram6t"/></configuration_protocol>
  <layout><fixed_layout width="3" height="3"/></layout>
  ${extra}
</architecture>`;
}

describe("loadArchitecture", () => {
  const arch = loadArchitecture(demoArch);
  const lib = arch.circuitLib;

  it("reads the circuit library", () => {
    expect(lib.modelIds().map((id) => lib.modelName(id))).toEqual([
      "INVTX1",
      "TGATE",
      "MUX2",
      "chan_segment",
      "mux_tree",
      "mux_2level",
      "lut4",
      "DFF",
      "GPIO",
    ]);
    const mux2 = lib.findModel("MUX2");
    expect(mux2).toBeDefined();
    if (mux2 !== undefined) expect(lib.gateType(mux2)).toBe("MUX2");
    const twoLevel = lib.findModel("mux_2level");
    if (twoLevel !== undefined) expect(lib.passGateLogicModel(twoLevel)).toBe(mux2);
  });

  it("reads the configuration protocol and the layout", () => {
    expect(arch.sramOrganization).toBe("scan_chain");
    expect(lib.modelName(arch.sramModel)).toBe("DFF");
    expect(arch.deviceSize).toEqual({ x: 4, y: 4 });
    expect(arch.perimeterBlock).toBe("io");
    expect(arch.cornerBlock).toBeNull();
    expect(arch.fillBlock).toBe("clb");
    expect(arch.segments.map((s) => s.name)).toEqual(["L1", "L4"]);
  });

  it("builds the pb_type hierarchy with parent links", () => {
    const graph = arch.pbGraph;
    expect(graph.pbTypeIds().map((id) => graph.pbTypeName(id))).toEqual(["io", "iopad", "clb", "fle", "ble4", "lut4", "ff"]);
    expect(graph.rootPbTypes().map((id) => graph.pbTypeName(id))).toEqual(["io", "clb"]);
    const mode = graph.parentMode(3);
    expect(mode).not.toBeNull();
    if (mode !== null) {
      expect(graph.modeName(mode)).toBe("default");
      expect(graph.modeParentPbType(mode)).toBe(2);
    }
    expect(graph.portsOf(2).map((p) => `${p.kind}:${p.name}:${p.numPins}`)).toEqual(["input:I:4", "output:O:2", "clock:clk:1"]);
  });
});

describe("parseArchitecture errors", () => {
  const sram = `<circuit_model type="sram" name="sram6t"/>`;

  it("accepts a minimal architecture", () => {
    const arch = parseArchitecture(archWith(sram));
    expect(arch.sramOrganization).toBe("standalone");
    expect(arch.fillBlock).toBeNull();
    expect(arch.segments).toEqual([]);
  });

  it("requires the architecture root", () => {
    expect(() => parseArchitecture("<fabric/>")).toThrow("missing <architecture> root element");
  });

  it("rejects unknown model types", () => {
    expect(() => parseArchitecture(archWith(`${sram}<circuit_model type="latch" name="L"/>`))).toThrow(
      "circuit_model 'L': unknown circuit model type 'latch'",
    );
  });

  it("rejects dangling pass-gate references", () => {
    const mux = `<circuit_model type="mux" name="m"><pass_gate_logic circuit_model_name="TG"/></circuit_model>`;
    expect(() => parseArchitecture(archWith(sram + mux))).toThrow("circuit_model 'm': pass_gate_logic refers to unknown model 'TG'");
  });

  it("rejects layout blocks that are not pb_types", () => {
    const xml = archWith(sram).replace(`<fixed_layout width="3" height="3"/>`, `<fixed_layout width="3" height="3"><fill type="clb"/></fixed_layout>`);
    expect(() => parseArchitecture(xml)).toThrow("fixed_layout: block type 'clb' is not a top-level pb_type");
  });

  it("rejects duplicate models", () => {
    expect(() => parseArchitecture(archWith(sram + sram))).toThrow("circuit_model 'sram6t': defined twice");
  });
});
