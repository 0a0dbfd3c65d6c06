export type DataIntegrityKind = 'MalformedRecord' | 'UnknownEnumerationValue';

/** One field of an indexed document that could not be read back into the domain. */
export interface DataIntegrityIssue {
  kind: DataIntegrityKind;
  field: string;
  value: unknown;
}

/**
 * The index holds a document the ingestion side would never have written:
 * a non-UUID identifier, an enumeration value outside its known set, or a
 * missing required field.
 */
export class DataIntegrityError extends Error {
  readonly kind: DataIntegrityKind;
  readonly field: string;
  readonly value: unknown;

  constructor(issue: DataIntegrityIssue) {
    super(`${issue.kind}: field "${issue.field}" holds ${JSON.stringify(issue.value) ?? 'undefined'}`);
    this.name = 'DataIntegrityError';
    this.kind = issue.kind;
    this.field = issue.field;
    this.value = issue.value;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
