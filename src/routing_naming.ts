import { violate } from "./contract.js";
import type { Coordinate, PortDirection, RrType } from "./fabric_types.js";
import { SEP, WIDE_SEP, coord, isCoordinate, num } from "./identifier.js";

function channelPrefix(chanType: RrType): string {
  switch (chanType) {
    case "CHANX":
      return "chanx";
    case "CHANY":
      return "chany";
    default:
      return violate(`invalid routing channel type '${String(chanType)}'`, { chanType: String(chanType) });
  }
}

function connectionBlockPrefix(cbType: RrType): string {
  switch (cbType) {
    case "CHANX":
      return "cbx_";
    case "CHANY":
      return "cby_";
    default:
      return violate(`invalid type of connection block '${String(cbType)}'`, { cbType: String(cbType) });
  }
}

function directionToken(dir: PortDirection): string {
  switch (dir) {
    case "IN_PORT":
      return "in_";
    case "OUT_PORT":
      return "out_";
    default:
      return violate(`invalid direction of routing track port '${String(dir)}'`, { portDirection: String(dir) });
  }
}

export function generateRoutingBlockNetlistName(prefix: string, block: number | Coordinate, postfix: string): string {
  const id = isCoordinate(block) ? coord(block, SEP) : num(block, "blockId");
  return `${prefix}${id}${postfix}`;
}

export function generateConnectionBlockNetlistName(cbType: RrType, coordinate: Coordinate, postfix: string): string {
  return generateRoutingBlockNetlistName(connectionBlockPrefix(cbType), coordinate, postfix);
}

// `chanx_3_` by block id, `chanx_1_2_` by coordinate.
export function generateRoutingChannelModuleName(chanType: RrType, block: number | Coordinate): string {
  const id = isCoordinate(block) ? coord(block, SEP) : num(block, "blockId");
  return `${channelPrefix(chanType)}${SEP}${id}${SEP}`;
}

function trackPortPrefix(chanType: RrType, coordinate: Coordinate): string {
  return `${channelPrefix(chanType)}${SEP}${coord(coordinate, WIDE_SEP)}${WIDE_SEP}`;
}

export function generateRoutingTrackPortName(chanType: RrType, coordinate: Coordinate, trackId: number, portDirection: PortDirection): string {
  return `${trackPortPrefix(chanType, coordinate)}${directionToken(portDirection)}${num(trackId, "trackId")}${SEP}`;
}

export function generateRoutingTrackMiddleOutputPortName(chanType: RrType, coordinate: Coordinate, trackId: number): string {
  return `${trackPortPrefix(chanType, coordinate)}midout_${num(trackId, "trackId")}${SEP}`;
}

export function generateSwitchBlockModuleName(coordinate: Coordinate): string {
  return `sb_${coord(coordinate, WIDE_SEP)}${SEP}`;
}

export function generateConnectionBlockModuleName(cbType: RrType, coordinate: Coordinate): string {
  return `${connectionBlockPrefix(cbType)}${coord(coordinate, WIDE_SEP)}${SEP}`;
}
