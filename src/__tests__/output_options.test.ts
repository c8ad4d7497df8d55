import { describe, it, expect } from "vitest";
import { mergeOutputOptions, mergeReportRules, outputPath, parseNameRules } from "../output_options.js";

describe("parseNameRules", () => {
  it("falls back to defaults for an empty document", () => {
    const rules = parseNameRules("");
    expect(rules.output).toEqual({
      output_directory: ".",
      support_icarus_simulator: false,
      include_timing: false,
      include_signal_init: false,
      explicit_port_mapping: false,
      compress_routing: false,
      verbose_output: false,
    });
    expect(rules.report).toEqual({ mux_sizes: [2, 4], channel_width: 2, grid_prefix: "grid_", logical_tile_prefix: "logical_tile_" });
  });

  it("reads the output switches", () => {
    const rules = parseNameRules(
      [
        "output:",
        "  output_directory: build/names",
        "  include_timing: true",
        "  compress_routing: 'yes'",
        "  verbose_output: 5",
        "report:",
        "  channel_width: '3'",
        "  mux_sizes: [8, 2, 8, 1, x]",
        "  grid_prefix: tile_",
      ].join("\n"),
    );
    expect(rules.output.output_directory).toBe("build/names");
    expect(rules.output.include_timing).toBe(true);
    expect(rules.output.compress_routing).toBe(true);
    expect(rules.output.verbose_output).toBe(false);
    expect(rules.report.channel_width).toBe(3);
    expect(rules.report.mux_sizes).toEqual([2, 8]);
    expect(rules.report.grid_prefix).toBe("tile_");
    expect(rules.report.logical_tile_prefix).toBe("logical_tile_");
  });
});

describe("merging", () => {
  it("ignores documents that are not mappings", () => {
    expect(mergeOutputOptions(["a"]).output_directory).toBe(".");
    expect(mergeReportRules(42).mux_sizes).toEqual([2, 4]);
  });

  it("places output files under the output directory", () => {
    const opts = mergeOutputOptions({ output: { output_directory: "out" } });
    expect(outputPath(opts, "fabric_names.json")).toBe("out/fabric_names.json");
  });
});
