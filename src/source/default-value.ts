/**
 * 可选默认值
 *
 * 区分“没有配置默认值”与“默认值为 null”：存储中缺失某个 key 时，
 * 订阅方需要知道这是错误还是应当回退到默认值
 */
export type OptionalDefaultValue<T> =
  | { readonly present: true; readonly value: T }
  | { readonly present: false };

export const DefaultValue = {
  of<T>(value: T): OptionalDefaultValue<T> {
    return { present: true, value };
  },

  none<T>(): OptionalDefaultValue<T> {
    return { present: false };
  },
} as const;
