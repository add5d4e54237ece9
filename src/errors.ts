export type PipelineErrorKind =
  | 'UnknownEntity' // name not in the entity list or alias table
  | 'InsufficientData' // no scored records for an entity in the window
  | 'MalformedRecord' // report document or section failed validation
  | 'EmptyWindow'; // no entity has data; the run produces no narrative

export class PipelineError extends Error {
  constructor(
    public readonly kind: PipelineErrorKind,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

export function isPipelineError(err: unknown, kind?: PipelineErrorKind): err is PipelineError {
  return err instanceof PipelineError && (kind === undefined || err.kind === kind);
}
