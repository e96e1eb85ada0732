/**
 * Property 模块
 *
 * 提供动态属性的抽象与各个变体：
 * - AtomicProperty：可变根属性
 * - MappedProperty：单源派生
 * - CombinedProperty：多源派生
 * - ConstantProperty / DelegatedProperty：常量与委托
 */

import { AtomicProperty } from "./atomic-property";
import { CombinedProperty } from "./combined-property";
import { ConstantProperty, DelegatedProperty } from "./constant-property";
import { MappedProperty } from "./mapped-property";
import type { DynamicProperty, PropertyOptions } from "./types";

export { AtomicProperty } from "./atomic-property";
export { MappedProperty } from "./mapped-property";
export { CombinedProperty } from "./combined-property";
export { ConstantProperty, DelegatedProperty } from "./constant-property";
export { ListenerRegistry } from "./listeners";

export type {
  DynamicProperty,
  PropertyKind,
  PropertyListener,
  PropertyOptions,
  PropertySubscription,
} from "./types";

/**
 * 判断任意值是否为动态属性
 */
export function isDynamicProperty(
  value: unknown
): value is DynamicProperty<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    "get" in value &&
    "addListener" in value &&
    "close" in value &&
    typeof value.get === "function" &&
    typeof value.addListener === "function" &&
    typeof value.close === "function"
  );
}

/**
 * 属性构造辅助工具
 *
 * @example
 * ```typescript
 * const raw = Properties.atomic("159");
 * const parsed = Properties.map(raw, (text) => Number(text));
 * parsed.get(); // 159
 * ```
 */
export const Properties = {
  of<T>(value: T, options?: PropertyOptions): DynamicProperty<T> {
    return new ConstantProperty(value, options);
  },

  delegated<T>(supplier: () => T, options?: PropertyOptions): DynamicProperty<T> {
    return new DelegatedProperty(supplier, options);
  },

  atomic<T>(initialValue: T, options?: PropertyOptions): AtomicProperty<T> {
    return new AtomicProperty(initialValue, options);
  },

  map<T, R>(
    source: DynamicProperty<T>,
    map: (value: T) => R,
    options?: PropertyOptions
  ): DynamicProperty<R> {
    return new MappedProperty(source, map, options);
  },

  combine<R>(
    sources: ReadonlyArray<DynamicProperty<unknown>>,
    combiner: () => R,
    options?: PropertyOptions
  ): DynamicProperty<R> {
    return new CombinedProperty(sources, combiner, options);
  },
} as const;
