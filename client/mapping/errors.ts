type MappingErrorInit = {
  entity: string;
  /** Dotted path to the offending field, e.g. `fields[2].label`. */
  field?: string;
  value?: unknown;
};

function preview(value: unknown): string {
  const text = JSON.stringify(value) ?? String(value);
  return text.length > 60 ? `${text.slice(0, 57)}...` : text;
}

/**
 * Raised when a payload does not fit its entity schema.
 * Not retryable: it signals that the upstream API contract moved.
 */
export class MappingError extends Error {
  readonly entity: string;
  readonly field?: string;
  readonly value: unknown;
  /** Position in the source array when raised by the collection mapper. */
  index?: number;

  constructor(message: string, init: MappingErrorInit) {
    super(message);
    this.name = new.target.name;
    this.entity = init.entity;
    this.field = init.field;
    this.value = init.value;
  }

  get location(): string {
    return this.field ? `${this.entity}.${this.field}` : this.entity;
  }
}

export class MissingRequiredFieldError extends MappingError {
  constructor(init: { entity: string; field: string }) {
    super(`${init.entity}.${init.field} is required but missing`, init);
  }
}

export class MalformedFieldError extends MappingError {
  readonly expected: string;

  constructor(init: MappingErrorInit & { expected: string }) {
    const where = init.field ? `${init.entity}.${init.field}` : init.entity;
    super(`${where}: expected ${init.expected}, got ${preview(init.value)}`, init);
    this.expected = init.expected;
  }
}
