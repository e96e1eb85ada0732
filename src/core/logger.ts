import winston, { format } from "winston";

/**
 * 日志接收器
 *
 * 引擎内部只依赖这四个方法，winston 的 Logger 可以直接传入，
 * 测试中也可以传入 vi.fn() 组成的替身
 */
export interface PropertyLogger {
  error(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  debug(message: string, ...meta: unknown[]): void;
}

let TestHook: ((msg: string) => void) | null = null;

export function setTestHook(hook: ((msg: string) => void) | null) {
  TestHook = hook;
}

function renderMeta(item: unknown): string {
  if (item instanceof Error) {
    return item.stack || item.message;
  }
  if (typeof item === "object" && item !== null) {
    return JSON.stringify(item, null, 2);
  }
  return describeValue(item);
}

/**
 * 把任意值渲染为日志文本，不会抛出异常
 *
 * 无原型对象或 toString 抛出异常的值回退到 Object.prototype.toString
 */
export function describeValue(value: unknown): string {
  try {
    return String(value);
  } catch {
    try {
      return Object.prototype.toString.call(value);
    } catch {
      return "[unprintable value]";
    }
  }
}

// 自定义日志格式，把 splat 参数（错误、对象）展开到消息下方
const customFormat = format.printf((info) => {
  const { level, timestamp, message } = info;
  const splat: unknown = info[Symbol.for("splat")];

  let msg = `${timestamp} [${level}] ${message}`;

  if (Array.isArray(splat) && splat.length > 0) {
    msg += `\n${splat.map(renderMeta).join("\n")}`;
  }

  if (TestHook) {
    TestHook(msg);
  }

  return msg;
});

/**
 * 创建 winston 日志实例
 *
 * @param level 日志级别，默认读取 LOG_LEVEL
 */
export function createLogger(level: string = process.env.LOG_LEVEL || "info") {
  return winston.createLogger({
    level,
    transports: [
      new winston.transports.Console({
        format: format.combine(
          format.colorize({ all: true }),
          format.timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
          customFormat
        ),
      }),
    ],
  });
}

const logger: PropertyLogger = createLogger();

export default logger;
