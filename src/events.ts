import type { EventBusOptions, NativeEventCallback, NativeEventDetail } from "./type";

export const DEFAULT_EVENT_BUS_OPTIONS: EventBusOptions = {
  eventName: "native-event",
  debug: false,
};

/**
 * 原生端的类名形式事件可能带有前导反斜杠转义，匹配前去掉
 */
export function normalizeEventName(raw: string): string {
  return raw.replace(/^\\+/, "");
}

function readDetail(event: Event): NativeEventDetail | null {
  if (!("detail" in event)) {
    return null;
  }
  const { detail } = event;
  if (typeof detail !== "object" || detail === null || !("event" in detail)) {
    return null;
  }
  if (typeof detail.event !== "string") {
    return null;
  }
  return { event: detail.event, payload: "payload" in detail ? detail.payload : undefined };
}

type BusState = "uninitialized" | "attached";

/**
 * 接收宿主派发的单一 native-event，按事件名分发给注册的回调
 */
export class NativeEventBus {
  private listeners: Map<string, NativeEventCallback[]> = new Map();
  private state: BusState = "uninitialized";
  private target: EventTarget | null = null;
  private warnedNoTarget = false;
  private options: EventBusOptions;

  constructor(options?: Partial<EventBusOptions>) {
    this.options = { ...DEFAULT_EVENT_BUS_OPTIONS, ...options };
  }

  private handleHostEvent = (event: Event): void => {
    const detail = readDetail(event);
    if (!detail) {
      console.warn(`NativeBridge: Ignoring malformed "${this.options.eventName}" event.`, event);
      return;
    }
    this.dispatch(detail.event, detail.payload);
  };

  /**
   * 只在第一次注册时挂载到宿主事件上，之后不再重复挂载
   */
  private attach(): void {
    if (this.state === "attached") {
      return;
    }
    const target = this.options.target ?? (typeof document === "undefined" ? null : document);
    if (!target) {
      if (!this.warnedNoTarget) {
        console.warn("NativeBridge: No event target available, native events will only arrive through dispatch().");
        this.warnedNoTarget = true;
      }
      return;
    }
    target.addEventListener(this.options.eventName, this.handleHostEvent);
    this.target = target;
    this.state = "attached";
  }

  public isAttached(): boolean {
    return this.state === "attached";
  }

  /**
   * 监听原生事件。同一个回调注册两次会被调用两次
   * @returns 取消这次监听的函数
   */
  public on(eventName: string, callback: NativeEventCallback): () => void {
    this.attach();

    const callbacks = this.listeners.get(eventName) ?? [];
    this.listeners.set(eventName, [...callbacks, callback]);
    if (this.options.debug) {
      console.log(`NativeBridge: Listener registered for "${eventName}"`);
    }
    return () => this.off(eventName, callback);
  }

  /**
   * 移除所有与 callback 相同引用的监听，不存在时什么也不做
   */
  public off(eventName: string, callback: NativeEventCallback): void {
    const callbacks = this.listeners.get(eventName);
    if (callbacks) {
      this.listeners.set(
        eventName,
        callbacks.filter((cb) => cb !== callback)
      );
    }
  }

  public listenerCount(eventName: string): number {
    return this.listeners.get(eventName)?.length ?? 0;
  }

  /**
   * 把一条原生事件分发给当前注册的回调。单个回调出错只记录日志，不影响其他回调
   */
  public dispatch(rawEventName: string, payload?: unknown): void {
    const eventName = normalizeEventName(rawEventName);
    // on() / off() 都会替换数组，这里遍历的是分发开始时的列表
    const callbacks = this.listeners.get(eventName) ?? [];
    if (this.options.debug) {
      console.log(`NativeBridge: Dispatching "${eventName}" to ${callbacks.length} listener(s)`);
    }

    for (const callback of callbacks) {
      try {
        const result = callback(payload, eventName);
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.reportListenerError(eventName, error));
        }
      } catch (error) {
        this.reportListenerError(eventName, error);
      }
    }
  }

  private reportListenerError(eventName: string, error: unknown): void {
    console.error(`NativeBridge: Error in event listener for "${eventName}":`, error);
  }

  /**
   * 从宿主事件上卸载并清空所有监听
   */
  public dispose(): void {
    this.target?.removeEventListener(this.options.eventName, this.handleHostEvent);
    this.target = null;
    this.state = "uninitialized";
    this.listeners.clear();
  }
}
