export type PuppetLoadErrorKind =
  | 'MalformedStructure'
  | 'DanglingReference'
  | 'VertexCountMismatch'
  | 'UnknownNodeVariant';

export class PuppetLoadError extends Error {
  readonly kind: PuppetLoadErrorKind;

  constructor(kind: PuppetLoadErrorKind, message: string) {
    super(`${kind}: ${message}`);
    this.name = 'PuppetLoadError';
    this.kind = kind;
  }
}

export const isPuppetLoadError = (error: unknown): error is PuppetLoadError => (
  error instanceof PuppetLoadError
);
