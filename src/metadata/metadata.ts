/**
 * 属性元数据管理工具
 *
 * 提供属性装饰器的元数据收集能力，与业务逻辑解耦
 * 类似于 reflect-metadata，但更简单、更轻量
 *
 * - 每种装饰器拥有自己的 FieldMetadataStore，元数据类型由泛型确定
 * - 使用 Stage 3 装饰器标准，元数据在实例构造时通过 addInitializer 收集
 */

/**
 * 获取类构造函数
 *
 * @param target 类或类实例
 */
function resolveClass(target: unknown): Function | null {
  if (typeof target === "function") {
    return target;
  }
  if (typeof target === "object" && target !== null) {
    return target.constructor;
  }
  return null;
}

/**
 * 属性元数据存储（按类和属性名组织）
 * 使用 WeakMap 存储，key 是类构造函数，value 是 Map<fieldName, metadata>
 */
export class FieldMetadataStore<M> {
  private readonly store = new WeakMap<Function, Map<string, M>>();

  /**
   * 记录元数据，同一属性只记录第一次
   */
  record(target: unknown, fieldName: string, metadata: M): void {
    const targetClass = resolveClass(target);
    if (!targetClass) return;

    let fieldMap = this.store.get(targetClass);
    if (!fieldMap) {
      fieldMap = new Map();
      this.store.set(targetClass, fieldMap);
    }
    if (!fieldMap.has(fieldName)) {
      fieldMap.set(fieldName, metadata);
    }
  }

  /**
   * 获取类的所有属性元数据
   *
   * @param target 类或类实例
   * @returns 属性名 -> 元数据
   */
  getAll(target: unknown): Map<string, M> {
    const targetClass = resolveClass(target);
    if (!targetClass) {
      return new Map();
    }
    return new Map(this.store.get(targetClass) || []);
  }

  get(target: unknown, fieldName: string): M | undefined {
    return this.getAll(target).get(fieldName);
  }

  has(target: unknown, fieldName: string): boolean {
    return this.getAll(target).has(fieldName);
  }
}

/**
 * 创建属性装饰器工厂
 *
 * @example
 * ```typescript
 * const store = new FieldMetadataStore<{ key: string }>();
 * const ConfigField = createFieldDecorator(store);
 *
 * class UserService {
 *   @ConfigField({ key: "MAX_CONNECTIONS" })
 *   maxConnections = 10;
 * }
 *
 * new UserService();
 * store.get(UserService, "maxConnections"); // { key: "MAX_CONNECTIONS" }
 * ```
 */
export function createFieldDecorator<M>(store: FieldMetadataStore<M>) {
  return function (
    metadata: M
  ): <This, Value>(
    target: undefined,
    context: ClassFieldDecoratorContext<This, Value>
  ) => void {
    return function (_target, context) {
      const fieldName = context.name.toString();

      // 在 addInitializer 中收集元数据（实例化时执行）
      context.addInitializer(function () {
        store.record(this, fieldName, metadata);
      });
    };
  };
}
