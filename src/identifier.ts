import { violate } from "./contract.js";
import type { Coordinate } from "./fabric_types.js";

// Token separators shared by every generator.
export const SEP = "_";
export const WIDE_SEP = "__";

export function num(value: number, field: string): string {
  if (!Number.isSafeInteger(value) || value < 0) {
    return violate(`${field} must be a non-negative integer, got ${String(value)}`, { [field]: value });
  }
  return String(value);
}

export function coord(c: Coordinate, sep: string): string {
  return `${num(c.x, "x")}${sep}${num(c.y, "y")}`;
}

export function withPostfix(base: string, postfix: string): string {
  return postfix.length > 0 ? base + postfix : base;
}

export function isCoordinate(v: number | Coordinate): v is Coordinate {
  return typeof v === "object";
}
