export type Invocation = {
  resource: string;
  id?: number;
  params: Record<string, unknown>;
};

function scalar(text: string): unknown {
  if (text === "true") return true;
  if (text === "false") return false;
  if (/^\d+$/.test(text)) return Number(text);
  return text;
}

/**
 * `<resource> [id] key=value...`. Digit strings become numbers and `true`/`false`
 * booleans; a repeated key collects its values into an array.
 */
export function parseInvocation(args: readonly string[]): Invocation | undefined {
  const [resource, ...rest] = args;
  if (!resource) return undefined;

  const invocation: Invocation = { resource, params: {} };
  const params: Record<string, unknown> = invocation.params;

  for (const [i, arg] of rest.entries()) {
    if (i === 0 && /^\d+$/.test(arg)) {
      invocation.id = Number(arg);
      continue;
    }
    const eq = arg.indexOf("=");
    if (eq <= 0) throw new Error(`expected key=value, got "${arg}"`);
    const key = arg.slice(0, eq);
    const value = scalar(arg.slice(eq + 1));
    const prior = params[key];
    params[key] = prior === undefined ? value : Array.isArray(prior) ? [...prior, value] : [prior, value];
  }
  return invocation;
}
