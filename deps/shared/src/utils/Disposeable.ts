export interface AsyncDisposable {
  [Symbol.asyncDispose](): Promise<void>;
}

/** 依序釋放資源，單一項目失敗不影響其他項目，最後拋出第一個錯誤 */
export async function dispose(...targets: AsyncDisposable[]): Promise<void> {
  let firstError: unknown;
  for (const target of targets) {
    try {
      await target[Symbol.asyncDispose]();
    } catch (error) {
      firstError ??= error;
    }
  }
  if (firstError !== undefined) throw firstError;
}
