import { violate } from "./contract.js";

export type PbTypeId = number;
export type ModeId = number;

type PbTypeNode = { name: string; parentMode: ModeId | null };
type ModeNode = { name: string; parentPbType: PbTypeId | null };

export type PbTypePort = {
  name: string;
  kind: "input" | "output" | "clock";
  numPins: number;
  parentPbType: PbTypeId;
};

/**
 * Physical-block-type hierarchy stored as two arenas. Each node keeps only
 * the index of its parent; nothing points downwards, so the naming code can
 * only walk towards the root.
 */
export class PbTypeGraph {
  private readonly pbTypes: PbTypeNode[] = [];
  private readonly modes: ModeNode[] = [];
  private readonly ports: PbTypePort[] = [];

  addPbType(name: string, parentMode: ModeId | null = null): PbTypeId {
    if (parentMode !== null) this.mode(parentMode);
    this.pbTypes.push({ name, parentMode });
    return this.pbTypes.length - 1;
  }

  addMode(name: string, parentPbType: PbTypeId | null): ModeId {
    if (parentPbType !== null) this.pbType(parentPbType);
    this.modes.push({ name, parentPbType });
    return this.modes.length - 1;
  }

  addPort(port: PbTypePort): void {
    this.pbType(port.parentPbType);
    this.ports.push({ ...port });
  }

  pbTypeIds(): PbTypeId[] {
    return this.pbTypes.map((_, i) => i);
  }

  rootPbTypes(): PbTypeId[] {
    return this.pbTypeIds().filter((id) => this.pbType(id).parentMode === null);
  }

  findRootPbType(name: string): PbTypeId | undefined {
    return this.rootPbTypes().find((id) => this.pbType(id).name === name);
  }

  portsOf(id: PbTypeId): PbTypePort[] {
    return this.ports.filter((p) => p.parentPbType === id);
  }

  pbTypeName(id: PbTypeId): string {
    return this.pbType(id).name;
  }

  parentMode(id: PbTypeId): ModeId | null {
    return this.pbType(id).parentMode;
  }

  modeName(id: ModeId): string {
    return this.mode(id).name;
  }

  modeParentPbType(id: ModeId): PbTypeId | null {
    return this.mode(id).parentPbType;
  }

  private pbType(id: PbTypeId): PbTypeNode {
    const node = this.pbTypes[id];
    if (!node) return violate(`unknown pb_type id ${id}`, { pbTypeId: id });
    return node;
  }

  private mode(id: ModeId): ModeNode {
    const node = this.modes[id];
    if (!node) return violate(`unknown mode id ${id}`, { modeId: id });
    return node;
  }
}
