/**
 * Failures that make the output of one segment or story impossible to produce.
 * Returned rather than thrown so callers can move on to the next unit of work.
 */
export type PipelineFailure =
  | {
      kind: 'offset-relocation'
      message: string
      word: string
      paragraph: string
    }
  | {
      kind: 'ner-desync'
      message: string
      token: string
      offset: number
    }
  | {
      kind: 'bracket-mismatch'
      message: string
    }

export type Result<T, E = PipelineFailure> =
  | { ok: true; value: T }
  | { ok: false; error: E }

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value }
}

export function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error }
}
