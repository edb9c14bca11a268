// 도메인 연산 결과: 실패는 throw 대신 값으로 반환

import type { GameError } from '../common/errors/game-errors.js';

export type Result<T, E extends GameError = GameError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E extends GameError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/** 컨트롤러 경계에서 결과를 풀고 실패는 throw */
export function unwrap<T, E extends GameError>(result: Result<T, E>): T {
  if (!result.ok) throw result.error;
  return result.value;
}
