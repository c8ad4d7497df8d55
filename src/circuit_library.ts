import { violate } from "./contract.js";

export type CircuitModelType =
  | "mux"
  | "lut"
  | "gate"
  | "sram"
  | "ff"
  | "ccff"
  | "wire"
  | "chan_wire"
  | "inv_buf"
  | "pass_gate"
  | "iopad"
  | "hard_logic";

export const CIRCUIT_MODEL_TYPES: readonly CircuitModelType[] = [
  "mux",
  "lut",
  "gate",
  "sram",
  "ff",
  "ccff",
  "wire",
  "chan_wire",
  "inv_buf",
  "pass_gate",
  "iopad",
  "hard_logic",
];

export type GateKind = "AND" | "OR" | "MUX2";

export const GATE_KINDS: readonly GateKind[] = ["AND", "OR", "MUX2"];

export type CircuitModelId = number;

export type CircuitModel = {
  name: string;
  type: CircuitModelType;
  gateKind?: GateKind;
  passGateLogicModel?: CircuitModelId;
};

/**
 * Circuit Model Catalog. Filled once by the architecture loader and then
 * only read by the naming functions.
 */
export class CircuitLibrary {
  private readonly models: CircuitModel[] = [];

  addModel(model: CircuitModel): CircuitModelId {
    if (model.type === "gate" && model.gateKind === undefined) {
      return violate(`gate model '${model.name}' has no gate kind`, { modelName: model.name });
    }
    this.models.push({ ...model });
    return this.models.length - 1;
  }

  setPassGateLogicModel(id: CircuitModelId, passGate: CircuitModelId): void {
    const model = this.get(id);
    this.get(passGate);
    model.passGateLogicModel = passGate;
  }

  modelIds(): CircuitModelId[] {
    return this.models.map((_, i) => i);
  }

  modelsOfType(type: CircuitModelType): CircuitModelId[] {
    return this.modelIds().filter((id) => this.models[id]?.type === type);
  }

  findModel(name: string): CircuitModelId | undefined {
    const idx = this.models.findIndex((m) => m.name === name);
    return idx >= 0 ? idx : undefined;
  }

  modelName(id: CircuitModelId): string {
    return this.get(id).name;
  }

  modelType(id: CircuitModelId): CircuitModelType {
    return this.get(id).type;
  }

  gateType(id: CircuitModelId): GateKind {
    const model = this.get(id);
    if (model.type !== "gate" || model.gateKind === undefined) {
      return violate(`circuit model '${model.name}' is not a logic gate`, { modelId: id, modelName: model.name, modelType: model.type });
    }
    return model.gateKind;
  }

  passGateLogicModel(id: CircuitModelId): CircuitModelId | undefined {
    return this.get(id).passGateLogicModel;
  }

  private get(id: CircuitModelId): CircuitModel {
    const model = this.models[id];
    if (!model) return violate(`unknown circuit model id ${id}`, { modelId: id });
    return model;
  }
}
