/** Whether a payload came from a single-object fetch or a collection fetch. */
export type CallShape = "detail" | "list";

/**
 * Schema drift signals. Neither is an error: unknown keys are ignored by the mapper,
 * and detail-only fields may legitimately be missing.
 */
export type Diagnostic =
  | { readonly type: "unknown-key"; readonly entity: string; readonly path: string; readonly value: unknown }
  | { readonly type: "missing-detail-field"; readonly entity: string; readonly path: string };

export type DiagnosticSink = (diagnostic: Diagnostic) => void;

export const consoleDiagnostics: DiagnosticSink = (d) => {
  if (d.type === "unknown-key") {
    console.error(`[drift] ${d.entity}: unmapped key ${d.path}`);
  } else {
    console.error(`[drift] ${d.entity}: detail payload lacks ${d.path}`);
  }
};

export function collectDiagnostics(): { sink: DiagnosticSink; diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  return { sink: (d) => diagnostics.push(d), diagnostics };
}
