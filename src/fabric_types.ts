import { violate } from "./contract.js";

export type Coordinate = { x: number; y: number };

export type Side = "top" | "right" | "bottom" | "left";

export const SIDES: readonly Side[] = ["top", "right", "bottom", "left"];

export type RrType = "CHANX" | "CHANY";

export type PortDirection = "IN_PORT" | "OUT_PORT";

export type SramOrganization = "standalone" | "scan_chain" | "memory_bank";

export const SRAM_ORGANIZATIONS: readonly SramOrganization[] = ["standalone", "scan_chain", "memory_bank"];

export type SpicePortKind = "input" | "output" | "inout" | "bl" | "wl" | "blb" | "wlb";

export const SPICE_PORT_KINDS: readonly SpicePortKind[] = ["input", "output", "inout", "bl", "wl", "blb", "wlb"];

export function sideToString(side: Side): string {
  switch (side) {
    case "top":
      return "top";
    case "right":
      return "right";
    case "bottom":
      return "bottom";
    case "left":
      return "left";
    default:
      return violate(`invalid side '${String(side)}'`, { side: String(side) });
  }
}

// Position of the side in the clockwise order starting from top.
export function sideIndex(side: Side): number {
  switch (side) {
    case "top":
      return 0;
    case "right":
      return 1;
    case "bottom":
      return 2;
    case "left":
      return 3;
    default:
      return violate(`invalid side '${String(side)}'`, { side: String(side) });
  }
}

export function parseSide(s: string): Side | undefined {
  const t = s.trim().toLowerCase();
  return SIDES.find((side) => side === t);
}

export function parseSramOrganization(s: string): SramOrganization | undefined {
  const t = s.trim().toLowerCase();
  return SRAM_ORGANIZATIONS.find((o) => o === t);
}
