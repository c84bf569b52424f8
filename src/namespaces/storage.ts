import { Methods } from "../methods";
import type { BridgeCaller } from "../type";
import type { SuccessResult } from "./device";

export function createSecureStorage(bridge: BridgeCaller) {
  return {
    /**
     * 写入钥匙串 / Keystore。value 为 null 时原样发送，由原生端删除该键
     */
    set: (key: string, value: string | null) => bridge.call<SuccessResult>(Methods.SecureStorage.Set, { key, value }),
    get: (key: string) => bridge.call<{ value: string | null }>(Methods.SecureStorage.Get, { key }),
    delete: (key: string) => bridge.call<SuccessResult>(Methods.SecureStorage.Delete, { key }),
  };
}

export function createFile(bridge: BridgeCaller) {
  return {
    move: (from: string, to: string) => bridge.call(Methods.File.Move, { from, to }),
    copy: (from: string, to: string) => bridge.call(Methods.File.Copy, { from, to }),
  };
}
