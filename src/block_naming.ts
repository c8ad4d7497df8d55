import { violate } from "./contract.js";
import type { CircuitLibrary, CircuitModelId } from "./circuit_library.js";
import { sideIndex, sideToString, type Coordinate, type Side } from "./fabric_types.js";
import { SEP, WIDE_SEP, coord, num } from "./identifier.js";
import type { PbTypeGraph, PbTypeId, PbTypePort } from "./pb_type_graph.js";

export function generateGridPortName(coordinate: Coordinate, height: number, side: Side, pinId: number, forTopNetlist: boolean): string {
  const h = num(height, "height");
  const pin = num(pinId, "pinId");
  if (forTopNetlist) {
    return `grid_${coord(coordinate, WIDE_SEP)}__pin_${h}${WIDE_SEP}${sideIndex(side)}${WIDE_SEP}${pin}${SEP}`;
  }
  return `${sideToString(side)}_height_${h}__pin_${pin}${SEP}`;
}

export function generateGridBlockPrefix(prefix: string, ioSide: Side | null): string {
  return ioSide === null ? prefix : `${prefix}${sideToString(ioSide)}${SEP}`;
}

export function generateGridBlockNetlistName(blockName: string, ioSide: Side | null, postfix: string): string {
  const base = ioSide === null ? blockName : `${blockName}${SEP}${sideToString(ioSide)}`;
  return base + postfix;
}

export function generateGridBlockModuleName(prefix: string, blockName: string, ioSide: Side | null): string {
  return prefix + generateGridBlockNetlistName(blockName, ioSide, "");
}

// <top>_mode[<mode>]_<parent>_mode[<mode>]_..._<pb_type>
export function generatePhysicalBlockModuleName(graph: PbTypeGraph, prefix: string, pbType: PbTypeId): string {
  let name = graph.pbTypeName(pbType);
  let cur: PbTypeId | null = pbType;
  while (cur !== null) {
    const parentMode = graph.parentMode(cur);
    if (parentMode === null) break;
    name = `mode[${graph.modeName(parentMode)}]_${name}`;
    cur = graph.modeParentPbType(parentMode);
    if (cur !== null) name = `${graph.pbTypeName(cur)}${SEP}${name}`;
  }
  if (graph.parentMode(pbType) === null) {
    name += `_mode[${graph.pbTypeName(pbType)}]`;
  }
  return prefix + name;
}

export function generateGridPhysicalBlockModuleName(graph: PbTypeGraph, prefix: string, pbType: PbTypeId, borderSide: Side | null): string {
  return generatePhysicalBlockModuleName(graph, generateGridBlockPrefix(prefix, borderSide), pbType);
}

export function generatePbTypePortName(graph: PbTypeGraph, port: PbTypePort): string {
  return `${graph.pbTypeName(port.parentPbType)}${SEP}${port.name}`;
}

export function findGridBorderSide(deviceSize: Coordinate, gridCoordinate: Coordinate): Side | null {
  if (gridCoordinate.y === deviceSize.y - 1) return "top";
  if (gridCoordinate.x === deviceSize.x - 1) return "right";
  if (gridCoordinate.y === 0) return "bottom";
  if (gridCoordinate.x === 0) return "left";
  return null;
}

// True for a core grid right next to the given border.
export function isCoreGridOnGivenBorderSide(deviceSize: Coordinate, gridCoordinate: Coordinate, borderSide: Side): boolean {
  switch (borderSide) {
    case "top":
      return gridCoordinate.y === deviceSize.y - 2;
    case "right":
      return gridCoordinate.x === deviceSize.x - 2;
    case "bottom":
      return gridCoordinate.y === 1;
    case "left":
      return gridCoordinate.x === 1;
    default:
      return violate(`invalid border side '${String(borderSide)}'`, { borderSide: String(borderSide) });
  }
}

export function generateFpgaTopModuleName(): string {
  return "fpga_top";
}

export function generateFpgaTopNetlistName(postfix: string): string {
  return generateFpgaTopModuleName() + postfix;
}

export function generateFpgaGlobalIoPortName(prefix: string, lib: CircuitLibrary, model: CircuitModelId): string {
  return prefix + lib.modelName(model);
}
