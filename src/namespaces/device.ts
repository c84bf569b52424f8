import { Methods } from "../methods";
import type { BridgeCaller } from "../type";

export interface SuccessResult {
  success: boolean;
}

export interface FlashlightResult extends SuccessResult {
  state: boolean; // true 表示打开
}

/** info 是 JSON 字符串，由原生端序列化 */
export interface DeviceInfoResult {
  info: string;
}

export interface NetworkStatusResult {
  connected: boolean;
  type?: string;
}

export function createDevice(bridge: BridgeCaller) {
  return {
    /** 短震动反馈 */
    vibrate: () => bridge.call<SuccessResult>(Methods.Device.Vibrate, {}),
    flashlight: () => bridge.call<FlashlightResult>(Methods.Device.ToggleFlashlight, {}),
    getId: () => bridge.call<{ id: string }>(Methods.Device.GetId, {}),
    getInfo: () => bridge.call<DeviceInfoResult>(Methods.Device.GetInfo, {}),
    /** batteryLevel 为 0-1，isCharging 为布尔值 */
    getBatteryInfo: () => bridge.call<DeviceInfoResult>(Methods.Device.GetBatteryInfo, {}),
  };
}

export type DeviceNamespace = ReturnType<typeof createDevice>;

/**
 * 基于 Device.GetInfo 的平台判断
 */
export function createSystem(device: DeviceNamespace) {
  async function platform(): Promise<string | null> {
    const result = await device.getInfo();
    if (!result?.info) {
      return null;
    }
    const info: unknown = JSON.parse(result.info);
    if (typeof info === "object" && info !== null && "platform" in info && typeof info.platform === "string") {
      return info.platform;
    }
    return null;
  }

  return {
    isIos: async () => (await platform()) === "ios",
    isAndroid: async () => (await platform()) === "android",
    isMobile: async () => {
      const current = await platform();
      return current === "ios" || current === "android";
    },
    /** @deprecated 使用 Device.flashlight() */
    flashlight: device.flashlight,
  };
}

export function createNetwork(bridge: BridgeCaller) {
  return {
    status: () => bridge.call<NetworkStatusResult>(Methods.Network.Status, {}),
  };
}
