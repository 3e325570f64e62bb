export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  nodeId?: number;
  field?: string;
  path?: string;
  details?: Record<string, unknown>;
};

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "nodeId" | "field" | "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.level === "error");
}
