export type ControllerResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

/**
 * Desktop lock surface. Implementations never throw: a missing session or a
 * broken transport comes back as `{ ok: false }`.
 */
export interface ScreenLockController {
  isLocked(): Promise<ControllerResult<boolean>>;
  lock(): Promise<ControllerResult<void>>;
  unlock(): Promise<ControllerResult<void>>;
}

export function ok<T>(value: T): ControllerResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: string): ControllerResult<T> {
  return { ok: false, error };
}
