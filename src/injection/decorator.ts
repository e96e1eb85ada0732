import { createFieldDecorator, FieldMetadataStore } from "../metadata/metadata";
import type { DynamicProperty } from "../property/types";
import type { PropertyType } from "../source/marshaller";

export interface PropertyIdMetadata {
  /**
   * 属性在属性源中的键
   */
  key: string;

  /**
   * 属性值类型
   */
  type: PropertyType<unknown>;
}

export const propertyIdMetadata = new FieldMetadataStore<PropertyIdMetadata>();

const PropertyIdField = createFieldDecorator(propertyIdMetadata);

/**
 * PropertyId 属性装饰器
 *
 * 标记一个 DynamicProperty 字段，由 DynamicPropertyInjector 替换为绑定到属性源的属性。
 * 字段的初始值作为默认值载体，注入时会写入属性源（若不存在）
 *
 * @param key 属性键
 * @param type 属性值的 Zod Schema
 *
 * @example
 * ```typescript
 * class OrderService {
 *   @PropertyId("order.pool-size", z.number().int().min(1))
 *   poolSize: DynamicProperty<number> = Properties.of(10);
 * }
 *
 * const service = await injector.inject(new OrderService());
 * service.poolSize.get(); // 存储中的值，或默认值 10
 * ```
 */
export function PropertyId<T>(key: string, type: PropertyType<T>) {
  const decorator = PropertyIdField({ key, type });
  return function <This>(
    target: undefined,
    context: ClassFieldDecoratorContext<This, DynamicProperty<T>>
  ): void {
    decorator(target, context);
  };
}
