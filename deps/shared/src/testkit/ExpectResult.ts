import type { Err, Ok, Result } from "~shared/utils/Result";

export function expectOk<T, E>(result: Result<T, E>): asserts result is Ok<T> {
  if (!result.ok) {
    throw new Error(`預期成功，實際失敗：${JSON.stringify(result.error)}`);
  }
}

export function expectErr<T, E>(result: Result<T, E>): asserts result is Err<E> {
  if (result.ok) {
    throw new Error(`預期失敗，實際成功：${JSON.stringify(result.value)}`);
  }
}
