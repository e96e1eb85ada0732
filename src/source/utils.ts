/**
 * 为 Promise 加上超时，超时后以 onTimeout() 的结果拒绝
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * 把键拼接到根路径下
 *
 * @example
 * ```typescript
 * joinPath("/config/app", "pool.size") // => "/config/app/pool.size"
 * joinPath("/config/app", "") // => "/config/app"
 * ```
 */
export function joinPath(prefix: string, key: string): string {
  return key ? `${prefix}/${key}` : prefix;
}
