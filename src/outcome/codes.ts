import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0400: { code: "E0400", severity: "error", category: "Validation", template: "Validation failed" },
  E0410: { code: "E0410", severity: "error", category: "Rules", template: "Rule {index} has an empty pattern" },
  E0411: { code: "E0411", severity: "error", category: "Rules", template: "Iteration count must be a non-negative integer, got {iterations}" },
  E0412: { code: "E0412", severity: "error", category: "Random", template: "Replay log exhausted after {draws} draws" },
  E0413: { code: "E0413", severity: "error", category: "Random", template: "A {kind} system requires a random source" },

  E0500: { code: "E0500", severity: "error", category: "Config", template: "Config file not found: {file}" },
  E0501: { code: "E0501", severity: "error", category: "Config", template: "Unsupported config file format: {ext}" },
  E0502: { code: "E0502", severity: "error", category: "Config", template: "Unknown preset: {name}" },

  W0001: { code: "W0001", severity: "warning", category: "Performance", template: "Large generation count: {generations}" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    data: params,
  };
}
