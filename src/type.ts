import type { NativeBridge } from "./native";

/** 可以被 JSON 序列化的值 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** bridge 方法的参数，可选字段直接省略而不是传 null */
export type BridgeParams = { [key: string]: JsonValue };

/**
 * 发送给原生端的请求
 */
export interface CallEnvelope {
  /** 形如 "Camera.GetPhoto" 的方法名，大小写敏感 */
  method: string;
  params: BridgeParams;
}

/**
 * 原生端返回的响应
 */
export type ResponseEnvelope<T = unknown> =
  | { status: "success"; data?: T }
  | { status: "error"; message?: string };

/**
 * transport 需要的最小 fetch 子集，浏览器的 fetch 直接满足
 */
export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string }
) => Promise<ResponseLike>;

export interface ResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

/**
 * 同步请求需要的最小 XMLHttpRequest 子集
 */
export interface SyncRequest {
  open(method: string, url: string, async: boolean): void;
  setRequestHeader(name: string, value: string): void;
  send(body: string): void;
}

export interface BridgeOptions {
  endpoint: string; // 原生端监听的本地路径
  csrfMetaName: string; // 存放 CSRF token 的 meta 标签 name
  csrfHeader: string;
  fetch?: FetchLike; // 未传时每次调用读取 globalThis.fetch
  createSyncRequest: () => SyncRequest;
  debug: boolean; // 打印每次请求
}

/**
 * 能够发起 bridge 调用的对象，builder 与各个命名空间只依赖它
 */
export interface BridgeCaller {
  call<T = unknown>(method: string, params?: BridgeParams): Promise<T | undefined>;
  callSync(method: string, params?: BridgeParams): void;
}

/** 原生端通过 native-event 推送的内容 */
export interface NativeEventDetail {
  event: string;
  payload?: unknown;
}

export type NativeEventCallback<T = unknown> = (
  payload: T,
  eventName: string
) => void | Promise<void>;

export interface EventBusOptions {
  eventName: string; // 宿主派发的 DOM 事件名
  target?: EventTarget; // 默认在 attach 时取 document
  debug: boolean;
}

declare global {
  interface Window {
    nativeBridge?: NativeBridge;
  }
}
