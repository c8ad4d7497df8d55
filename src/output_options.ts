import path from "path";
import { pathToFileURL } from "url";
import yaml from "js-yaml";
import { isRecord, readText } from "./util.js";

export type FabricOutputOption = {
  output_directory: string;
  support_icarus_simulator: boolean;
  include_timing: boolean;
  include_signal_init: boolean;
  explicit_port_mapping: boolean;
  compress_routing: boolean;
  verbose_output: boolean;
};

export type ReportRules = {
  mux_sizes: number[];
  channel_width: number;
  grid_prefix: string;
  logical_tile_prefix: string;
};

export type NameRules = {
  output: FabricOutputOption;
  report: ReportRules;
};

const defaultOutputOption: FabricOutputOption = {
  output_directory: ".",
  support_icarus_simulator: false,
  include_timing: false,
  include_signal_init: false,
  explicit_port_mapping: false,
  compress_routing: false,
  verbose_output: false,
};

const defaultReportRules: ReportRules = {
  mux_sizes: [2, 4],
  channel_width: 2,
  grid_prefix: "grid_",
  logical_tile_prefix: "logical_tile_",
};

function asBool(v: unknown): boolean | undefined {
  if (typeof v === "boolean") return v;
  if (typeof v === "string") {
    const t = v.trim().toLowerCase();
    if (["true", "yes", "on", "1"].includes(t)) return true;
    if (["false", "no", "off", "0"].includes(t)) return false;
  }
  return undefined;
}

function asCount(v: unknown): number | undefined {
  const n = typeof v === "string" && v.trim().length > 0 ? Number(v) : v;
  if (typeof n === "number" && Number.isSafeInteger(n) && n >= 0) return n;
  return undefined;
}

function asText(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

export function mergeOutputOptions(rules: unknown): FabricOutputOption {
  const raw: Record<string, unknown> = isRecord(rules) && isRecord(rules.output) ? rules.output : {};
  return {
    output_directory: asText(raw.output_directory) ?? defaultOutputOption.output_directory,
    support_icarus_simulator: asBool(raw.support_icarus_simulator) ?? defaultOutputOption.support_icarus_simulator,
    include_timing: asBool(raw.include_timing) ?? defaultOutputOption.include_timing,
    include_signal_init: asBool(raw.include_signal_init) ?? defaultOutputOption.include_signal_init,
    explicit_port_mapping: asBool(raw.explicit_port_mapping) ?? defaultOutputOption.explicit_port_mapping,
    compress_routing: asBool(raw.compress_routing) ?? defaultOutputOption.compress_routing,
    verbose_output: asBool(raw.verbose_output) ?? defaultOutputOption.verbose_output,
  };
}

export function mergeReportRules(rules: unknown): ReportRules {
  const raw: Record<string, unknown> = isRecord(rules) && isRecord(rules.report) ? rules.report : {};
  const sizes = Array.isArray(raw.mux_sizes)
    ? raw.mux_sizes.map(asCount).filter((x): x is number => x !== undefined && x >= 2)
    : undefined;
  return {
    mux_sizes: sizes && sizes.length > 0 ? Array.from(new Set(sizes)).sort((a, b) => a - b) : [...defaultReportRules.mux_sizes],
    channel_width: asCount(raw.channel_width) ?? defaultReportRules.channel_width,
    grid_prefix: asText(raw.grid_prefix) ?? defaultReportRules.grid_prefix,
    logical_tile_prefix: asText(raw.logical_tile_prefix) ?? defaultReportRules.logical_tile_prefix,
  };
}

export function parseNameRules(text: string): NameRules {
  const rules: unknown = yaml.load(text);
  return { output: mergeOutputOptions(rules), report: mergeReportRules(rules) };
}

export function loadNameRules(rulesPath: string): NameRules {
  return parseNameRules(readText(rulesPath));
}

export function outputPath(opts: FabricOutputOption, fileName: string): string {
  return path.join(opts.output_directory, fileName);
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain && process.argv.length >= 3) {
  const rules = loadNameRules(process.argv[2] ?? "");
  process.stdout.write(JSON.stringify(rules, null, 2));
}
