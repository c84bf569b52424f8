import { BridgeNetworkError, BridgeValidationError, NativeCallError } from "./errors";
import type {
  BridgeCaller,
  BridgeOptions,
  BridgeParams,
  CallEnvelope,
  FetchLike,
  ResponseEnvelope,
  ResponseLike,
} from "./type";

export const DEFAULT_BRIDGE_OPTIONS: BridgeOptions = {
  endpoint: "/_native/api/call",
  csrfMetaName: "csrf-token",
  csrfHeader: "X-CSRF-TOKEN",
  createSyncRequest: () => new XMLHttpRequest(),
  debug: false,
};

function isResponseEnvelope<T>(value: unknown): value is ResponseEnvelope<T> {
  if (typeof value !== "object" || value === null || !("status" in value)) {
    return false;
  }
  return value.status === "success" || value.status === "error";
}

/**
 * 通过本地 HTTP 端点调用原生端注册的 bridge 方法
 */
export class BridgeTransport implements BridgeCaller {
  private options: BridgeOptions;

  constructor(options?: Partial<BridgeOptions>) {
    this.options = { ...DEFAULT_BRIDGE_OPTIONS, ...options }; // 合并默认选项和传入选项
  }

  /**
   * 从页面 meta 标签读取 CSRF token，读不到时返回空字符串，不阻止请求
   */
  private csrfToken(): string {
    if (typeof document === "undefined") {
      return "";
    }
    const meta = document.querySelector(`meta[name="${this.options.csrfMetaName}"]`);
    return meta?.getAttribute("content") ?? "";
  }

  private headers(): Record<string, string> {
    return {
      "Content-Type": "application/json",
      [this.options.csrfHeader]: this.csrfToken(),
    };
  }

  /**
   * 调用原生方法，只尝试一次，不做重试
   * @param method - 例如 'Dialog.Alert'、'MyPlugin.CustomAction'
   * @param params - 传给原生方法的参数
   * @returns 原生端返回的 data，失败时 reject
   */
  public async call<T = unknown>(method: string, params: BridgeParams = {}): Promise<T | undefined> {
    if (!method) {
      throw new BridgeValidationError("method", "Bridge method name must not be empty");
    }
    const fetchImpl: FetchLike = this.options.fetch ?? globalThis.fetch;
    const envelope: CallEnvelope = { method, params };
    const body = JSON.stringify(envelope);
    if (this.options.debug) {
      console.log(`NativeBridge: Sending ${method}: ${body}`);
    }

    let response: ResponseLike;
    try {
      response = await fetchImpl(this.options.endpoint, {
        method: "POST",
        headers: this.headers(),
        body,
      });
    } catch (error) {
      throw new BridgeNetworkError(`Request for ${method} failed`, undefined, { cause: error });
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      // 响应头已经到达，但读取 body 时连接中断
      throw new BridgeNetworkError(
        `Response for ${method} could not be read (HTTP ${response.status})`,
        response.status,
        { cause: error }
      );
    }

    let result: unknown;
    try {
      result = JSON.parse(text);
    } catch (error) {
      throw new BridgeNetworkError(
        `Malformed response for ${method} (HTTP ${response.status})`,
        response.status,
        { cause: error }
      );
    }

    if (!isResponseEnvelope<T>(result)) {
      throw new BridgeNetworkError(`Unexpected response for ${method} (HTTP ${response.status})`, response.status);
    }
    if (result.status === "error") {
      throw new NativeCallError(method, result.message || "Native call failed");
    }
    if (!response.ok) {
      throw new BridgeNetworkError(`Native host responded with HTTP ${response.status} for ${method}`, response.status);
    }

    if (this.options.debug) {
      console.log(`NativeBridge: ${method} succeeded`);
    }
    return result.data;
  }

  /**
   * 同步发送，不读取响应，用在无法 await 的场景 (例如页面卸载前)
   * 只保证尽力发送，调用方拿不到成功或失败
   */
  public callSync(method: string, params: BridgeParams = {}): void {
    const envelope: CallEnvelope = { method, params };
    try {
      const request = this.options.createSyncRequest();
      request.open("POST", this.options.endpoint, false); // false = 同步
      for (const [name, value] of Object.entries(this.headers())) {
        request.setRequestHeader(name, value);
      }
      request.send(JSON.stringify(envelope));
    } catch (error) {
      console.error(`NativeBridge: Synchronous call ${method} could not be sent:`, error);
    }
  }
}
