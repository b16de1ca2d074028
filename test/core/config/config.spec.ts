// test/core/config/config.spec.ts
// Tests for configuration system

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  configFromEnv,
  configFromFile,
  configFromObject,
  loadConfig,
  mergeConfigs,
  parseSimpleYaml,
  validateConfig,
  DEFAULT_CONFIG,
} from "../../../src/core/config/config";
import { LSystemError } from "../../../src/outcome/failure";

describe("configFromEnv", () => {
  it("returns nothing when no env vars are set", () => {
    expect(configFromEnv("LSYS", {})).toEqual({ run: {}, output: {}, trace: {} });
  });

  it("reads every LSYS_ variable", () => {
    const env = {
      LSYS_PRESET: "koch",
      LSYS_GENERATIONS: "3",
      LSYS_SEED: "42",
      LSYS_FORMAT: "joined",
      LSYS_SEPARATOR: ",",
      LSYS_VERBOSE: "true",
      LSYS_TRACE_RULES: "0",
    };
    expect(configFromEnv("LSYS", env)).toEqual({
      run: { preset: "koch", generations: 3, seed: 42 },
      output: { format: "joined", separator: "," },
      trace: { verbose: true, rules: false },
    });
  });

  it("ignores values that do not parse", () => {
    const config = configFromEnv("LSYS", { LSYS_GENERATIONS: "many", LSYS_FORMAT: "yaml", LSYS_VERBOSE: "maybe" });
    expect(config.run?.generations).toBeUndefined();
    expect(config.output?.format).toBeUndefined();
    expect(config.trace?.verbose).toBeUndefined();
  });

  it("honors a custom prefix", () => {
    expect(configFromEnv("DEMO", { DEMO_PRESET: "cantor", LSYS_PRESET: "koch" }).run?.preset).toBe("cantor");
  });
});

describe("configFromObject", () => {
  it("reads nested sections and coerces numeric strings", () => {
    const config = configFromObject({
      run: { preset: "cantor", generations: "4" },
      trace: { trace_rules: true },
    });
    expect(config.run).toEqual({ preset: "cantor", generations: 4 });
    expect(config.trace?.rules).toBe(true);
  });

  it("ignores sections of the wrong shape", () => {
    expect(configFromObject({ run: "fast", output: [1] })).toEqual({ run: {}, output: {}, trace: {} });
  });
});

describe("mergeConfigs", () => {
  it("starts from the defaults", () => {
    expect(mergeConfigs()).toEqual(DEFAULT_CONFIG);
  });

  it("lets later layers win and skips undefined values", () => {
    const merged = mergeConfigs({ run: { generations: 3 } }, { run: { generations: undefined, seed: 9 } });
    expect(merged.run).toEqual({ preset: "all", generations: 3, seed: 9 });
    expect(DEFAULT_CONFIG.run.generations).toBe(7);
  });
});

describe("parseSimpleYaml", () => {
  it("parses nested maps and scalars", () => {
    const yaml = [
      "# lsys settings",
      "run:",
      "  preset: koch",
      "  generations: 3",
      "output:",
      '  format: "joined"',
      "trace:",
      "  verbose: true",
      "",
    ].join("\n");
    expect(parseSimpleYaml(yaml)).toEqual({
      run: { preset: "koch", generations: 3 },
      output: { format: "joined" },
      trace: { verbose: true },
    });
  });
});

describe("config files", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "lsys-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("loads JSON files", () => {
    const file = path.join(dir, "settings.json");
    fs.writeFileSync(file, JSON.stringify({ run: { preset: "koch", generations: 2 }, output: { format: "json" } }));
    const config = configFromFile(file);
    expect(config.run).toEqual({ preset: "koch", generations: 2 });
    expect(config.output?.format).toBe("json");
  });

  it("loads YAML files", () => {
    const file = path.join(dir, "settings.yml");
    fs.writeFileSync(file, "run:\n  seed: 11\n");
    expect(configFromFile(file).run?.seed).toBe(11);
  });

  it("reports missing files and unknown extensions", () => {
    try {
      configFromFile(path.join(dir, "absent.json"));
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(LSystemError);
      if (e instanceof LSystemError) expect(e.code).toBe("E0500");
    }

    const file = path.join(dir, "settings.txt");
    fs.writeFileSync(file, "run: 1");
    try {
      configFromFile(file);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(LSystemError);
      if (e instanceof LSystemError) {
        expect(e.code).toBe("E0501");
        expect(e.message).toBe("Unsupported config file format: .txt");
      }
    }
  });

  it("layers env, the default config file and overrides", () => {
    fs.writeFileSync(path.join(dir, "lsys.config.json"), JSON.stringify({ run: { generations: 2 } }));
    const config = loadConfig({
      env: { LSYS_GENERATIONS: "5", LSYS_PRESET: "algae" },
      cwd: dir,
      overrides: { run: { seed: 1 } },
    });
    expect(config.run).toEqual({ preset: "algae", generations: 2, seed: 1 });
  });

  it("uses an explicit config file", () => {
    const file = path.join(dir, "custom.yaml");
    fs.writeFileSync(file, "output:\n  format: json\n");
    expect(loadConfig({ env: {}, configFile: file }).output.format).toBe("json");
  });

  it("falls back to defaults", () => {
    expect(loadConfig({ env: {}, cwd: dir })).toEqual(DEFAULT_CONFIG);
  });
});

describe("validateConfig", () => {
  it("accepts the defaults", () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("rejects unknown presets, bad counts and bad seeds", () => {
    const result = validateConfig(mergeConfigs({ run: { preset: "nope", generations: -1, seed: 1.5 } }));
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      "Unknown preset: nope",
      "generations must be a non-negative integer",
      "seed must be an integer",
    ]);
  });

  it("warns about very long runs", () => {
    const result = validateConfig(mergeConfigs({ run: { generations: 30 } }));
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      { code: "W0001", severity: "warning", message: "Large generation count: 30", data: { generations: 30 } },
    ]);
  });
});
