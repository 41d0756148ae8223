/** Outcome of an iterative numeric solve, shaped like zod's `safeParse` result. */
export type SolveResult<T> = { success: true; value: T } | { success: false; error: string };

export function solved<T>(value: T): SolveResult<T> {
  return { success: true, value };
}

export function unsolved<T>(error: string): SolveResult<T> {
  return { success: false, error };
}
