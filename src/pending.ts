import { nanoid } from "nanoid";
import type { BridgeCaller, BridgeParams, JsonValue } from "./type";

/** builder 自己的配置字段，id / event 由基类统一管理 */
export type PendingFields = { [key: string]: JsonValue };

/** 没有额外配置字段的 builder */
export type NoFields = Record<string, never>;

/**
 * 描述一种 builder：字段默认值、目标方法、参数整形和发送前校验
 */
export interface PendingDefinition<F extends PendingFields> {
  /** 固定的方法名，或者根据字段计算 (例如 geolocation 的 action) */
  method: string | ((fields: Readonly<F>) => string);
  /** 每个实例拿到一份新的默认值 */
  defaults: () => F;
  /** 未提供时使用 compactParams */
  params?: (fields: Readonly<F>) => BridgeParams;
  /** 在发送之前抛出即可让 await 直接 reject，不会发起请求 */
  validate?: (fields: Readonly<F>) => void;
  /** getId() 在没有 id 时生成一个 */
  generateId?: boolean;
  /** 没有调用 event() 时使用的事件类 */
  defaultEvent?: string;
}

/**
 * 去掉值为 null 或 undefined 的字段
 */
export function compactParams(fields: Readonly<{ [key: string]: JsonValue | undefined }>): BridgeParams {
  const params: BridgeParams = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value !== null && value !== undefined) {
      params[key] = value;
    }
  }
  return params;
}

/**
 * 延迟执行的原生调用。链式方法只修改配置，第一次 await 时才真正调用原生端，
 * 之后再次 await 复用同一个结果，不会再发请求。
 *
 * @example
 * await Dialog.alert().title('Hi').message('Saved').buttons(['OK']);
 */
export abstract class PendingOperation<F extends PendingFields, R = void> implements PromiseLike<R | undefined> {
  protected readonly fields: F;
  private identity: { id: string | null; event: string | null };
  private dispatched: Promise<R | undefined> | null = null;

  constructor(
    private readonly transport: BridgeCaller,
    private readonly definition: PendingDefinition<F>,
    overrides?: Partial<F>
  ) {
    this.fields = { ...definition.defaults(), ...overrides };
    this.identity = { id: null, event: definition.defaultEvent ?? null };
  }

  /**
   * 修改一个配置字段。已经发送后再修改会被忽略，已发送的参数不会变化
   */
  protected set<K extends keyof F>(key: K, value: F[K]): this {
    if (this.isFrozen(String(key))) {
      return this;
    }
    this.fields[key] = value;
    return this;
  }

  private isFrozen(name: string): boolean {
    if (this.dispatched) {
      console.warn(`NativeBridge: "${name}" was set after ${this.method()} was dispatched and is ignored.`);
      return true;
    }
    return false;
  }

  /**
   * 设置一个唯一 ID，用于把之后的原生事件和这次调用对应起来
   */
  public id(id: string): this {
    if (!this.isFrozen("id")) {
      this.identity.id = id;
    }
    return this;
  }

  /**
   * 设置原生端完成后要触发的自定义事件类
   */
  public event(event: string): this {
    if (!this.isFrozen("event")) {
      this.identity.event = event;
    }
    return this;
  }

  public getId(): string | null {
    if (this.identity.id === null && this.definition.generateId) {
      this.identity.id = nanoid();
    }
    return this.identity.id;
  }

  public isStarted(): boolean {
    return this.dispatched !== null;
  }

  public method(): string {
    const { method } = this.definition;
    return typeof method === "string" ? method : method(this.fields);
  }

  /**
   * 让 builder 可以直接被 await，不需要再调用 .show() / .scan() 之类的方法
   */
  public then<TResult1 = R | undefined, TResult2 = never>(
    onfulfilled?: ((value: R | undefined) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): Promise<TResult1 | TResult2> {
    if (!this.dispatched) {
      this.dispatched = this.dispatch();
    }
    return this.dispatched.then(onfulfilled, onrejected);
  }

  private async dispatch(): Promise<R | undefined> {
    // 在第一个 await 之前同步取快照，之后的修改不会影响本次参数
    const fields: Readonly<F> = { ...this.fields };
    this.definition.validate?.(fields);

    const shape = this.definition.params ?? compactParams;
    const params: BridgeParams = { ...shape(fields) };
    const id = this.getId();
    if (id) params.id = id;
    if (this.identity.event) params.event = this.identity.event;

    return this.transport.call<R>(this.method(), params);
  }
}
