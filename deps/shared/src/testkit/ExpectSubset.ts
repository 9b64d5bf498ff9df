import { expect } from "vitest";

/** 斷言 actual 至少包含 subset 的欄位與值 */
export function expectHasSubset<T extends object>(actual: T, subset: Partial<T> & object) {
  expect(actual).toMatchObject(subset);
}
