export type ViolationContext = Record<string, string | number | boolean | null>;

export class ContractViolation extends Error {
  readonly context: ViolationContext;

  constructor(message: string, context: ViolationContext = {}) {
    super(message);
    this.name = "ContractViolation";
    this.context = context;
  }
}

export function violate(message: string, context: ViolationContext = {}): never {
  throw new ContractViolation(message, context);
}

export function describeViolation(e: ContractViolation): string {
  const ctx = Object.entries(e.context)
    .map(([k, v]) => `${k}=${String(v)}`)
    .join(" ");
  return ctx ? `${e.message} (${ctx})` : e.message;
}
