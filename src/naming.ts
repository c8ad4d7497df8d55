export * from "./block_naming.js";
export * from "./circuit_model_naming.js";
export * from "./routing_naming.js";
export * from "./sram_naming.js";
export { CircuitLibrary, CIRCUIT_MODEL_TYPES, GATE_KINDS } from "./circuit_library.js";
export type { CircuitModel, CircuitModelId, CircuitModelType, GateKind } from "./circuit_library.js";
export { PbTypeGraph } from "./pb_type_graph.js";
export type { ModeId, PbTypeId, PbTypePort } from "./pb_type_graph.js";
export { ContractViolation, describeViolation, violate } from "./contract.js";
export type { ViolationContext } from "./contract.js";
export { SIDES, SPICE_PORT_KINDS, SRAM_ORGANIZATIONS, parseSide, parseSramOrganization, sideIndex, sideToString } from "./fabric_types.js";
export type { Coordinate, PortDirection, RrType, Side, SpicePortKind, SramOrganization } from "./fabric_types.js";
