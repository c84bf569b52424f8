/**
 * SDK 抛出的所有错误的基类，`code` 用来区分错误类型
 */
export class NativeBridgeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * 原生端明确返回了 status: "error"
 */
export class NativeCallError extends NativeBridgeError {
  constructor(public readonly method: string, message: string) {
    super(message, "NATIVE_CALL_FAILED");
  }
}

/**
 * HTTP 请求本身失败，或者响应不是合法的 JSON / envelope
 */
export class BridgeNetworkError extends NativeBridgeError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: ErrorOptions
  ) {
    super(message, "NETWORK", options);
  }
}

/**
 * 调用原生端之前的本地参数校验失败
 */
export class BridgeValidationError extends NativeBridgeError {
  constructor(public readonly field: string, message = `${field} is required`) {
    super(message, "VALIDATION");
  }
}
