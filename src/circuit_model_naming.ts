import { violate } from "./contract.js";
import type { CircuitLibrary, CircuitModelId } from "./circuit_library.js";
import type { SpicePortKind } from "./fabric_types.js";
import { SEP, num, withPostfix } from "./identifier.js";

export function generateMuxNodeName(nodeLevel: number, addBufferPostfix: boolean): string {
  const name = `mux_l${num(nodeLevel, "nodeLevel")}_in`;
  return addBufferPostfix ? `${name}_buf` : name;
}

export function generateMuxBranchInstanceName(nodeLevel: number, nodeIndexAtLevel: number, addBufferPostfix: boolean): string {
  return `${generateMuxNodeName(nodeLevel, addBufferPostfix)}${SEP}${num(nodeIndexAtLevel, "nodeIndexAtLevel")}${SEP}`;
}

export function generateMuxSubcktName(lib: CircuitLibrary, model: CircuitModelId, muxSize: number, postfix: string): string {
  const type = lib.modelType(model);
  let name = lib.modelName(model);
  if (type === "mux") {
    name += `_size${num(muxSize, "muxSize")}`;
  } else if (type === "lut") {
    name += "_mux";
  } else {
    return violate(`circuit model '${name}' is neither a multiplexer nor a LUT`, { modelId: model, modelName: name, modelType: type });
  }
  return withPostfix(name, postfix);
}

export function generateMuxBranchSubcktName(
  lib: CircuitLibrary,
  model: CircuitModelId,
  muxSize: number,
  branchMuxSize: number,
  postfix: string,
): string {
  const passGate = lib.passGateLogicModel(model);
  // A MUX2 standard cell is the branch itself.
  if (passGate !== undefined && lib.modelType(passGate) === "gate") {
    const kind = lib.gateType(passGate);
    if (kind !== "MUX2") {
      return violate(`pass-gate logic '${lib.modelName(passGate)}' of '${lib.modelName(model)}' is a ${kind} gate, expected MUX2`, {
        modelId: model,
        passGateModelId: passGate,
        gateKind: kind,
      });
    }
    return lib.modelName(passGate);
  }
  return generateMuxSubcktName(lib, model, muxSize, `${postfix}_size${num(branchMuxSize, "branchMuxSize")}`);
}

export function generateMuxLocalDecoderSubcktName(addrSize: number, dataSize: number): string {
  return `decoder${num(addrSize, "addrSize")}to${num(dataSize, "dataSize")}`;
}

export function generateMemoryModuleName(lib: CircuitLibrary, model: CircuitModelId, sramModel: CircuitModelId, postfix: string): string {
  return `${lib.modelName(model)}${SEP}${lib.modelName(sramModel)}${postfix}`;
}

export function generateSegmentWireSubcktName(wireModelName: string, segmentId: number): string {
  return `${wireModelName}_seg${num(segmentId, "segmentId")}`;
}

export function generateSegmentWireMidOutputName(regularOutputName: string): string {
  return `mid_${regularOutputName}`;
}

export function generateConstValueModuleName(constVal: number): string {
  if (constVal === 0) return "const0";
  if (constVal === 1) return "const1";
  return violate(`constant value must be 0 or 1, got ${String(constVal)}`, { constVal });
}

export function generateConstValueModuleOutputPortName(constVal: number): string {
  return generateConstValueModuleName(constVal);
}

export function generateMuxInputBusPortName(lib: CircuitLibrary, muxModel: CircuitModelId, muxSize: number, muxInstanceId: number): string {
  return generateMuxSubcktName(lib, muxModel, muxSize, `_${num(muxInstanceId, "muxInstanceId")}_inbus`);
}

export function generateMuxConfigBusPortName(
  lib: CircuitLibrary,
  muxModel: CircuitModelId,
  muxSize: number,
  busId: number,
  inverted: boolean,
): string {
  let postfix = `_configbus${num(busId, "busId")}`;
  if (inverted) postfix += "_b";
  return generateMuxSubcktName(lib, muxModel, muxSize, postfix);
}

export function generateLocalSramPortName(portPrefix: string, instanceId: number, portType: SpicePortKind): string {
  const base = `${portPrefix}${SEP}${num(instanceId, "instanceId")}${SEP}`;
  if (portType === "input") return `${base}out`;
  if (portType === "output") return `${base}outb`;
  return violate(`local SRAM port must be input or output, got '${portType}'`, { portPrefix, portType });
}

export function generateMuxSramPortName(
  lib: CircuitLibrary,
  muxModel: CircuitModelId,
  muxSize: number,
  muxInstanceId: number,
  portType: SpicePortKind,
): string {
  const prefix = generateMuxSubcktName(lib, muxModel, muxSize, "");
  return generateLocalSramPortName(prefix, muxInstanceId, portType);
}
