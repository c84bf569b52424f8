import { NativeEventBus } from "./events";
import { createNative, type NativeBridge } from "./native";
import { BridgeTransport } from "./transport";

const transport = new BridgeTransport();
const bus = new NativeEventBus();
const instance: NativeBridge = createNative(transport, bus); // 默认实例

export const {
  bridgeCall,
  bridgeCallSync,
  On,
  Off,
  Dialog,
  Device,
  Haptics,
  System,
  Network,
  Browser,
  Share,
  Scanner,
  Camera,
  Gallery,
  Biometrics,
  Biometric,
  Geolocation,
  Microphone,
  PushNotifications,
  SecureStorage,
  File,
  Edge,
  MobileWallet,
} = instance;

export { transport, bus };
export { Events, CoreEvents, type NativeEventName } from "./catalog";
export { Methods } from "./methods";
export { BridgeTransport, DEFAULT_BRIDGE_OPTIONS } from "./transport";
export { NativeEventBus, normalizeEventName, DEFAULT_EVENT_BUS_OPTIONS } from "./events";
export { PendingOperation, compactParams, type PendingDefinition, type PendingFields } from "./pending";
export { createNative, type NativeBridge } from "./native";
export { NativeBridgeError, NativeCallError, BridgeNetworkError, BridgeValidationError } from "./errors";
export { PendingDialog, type ToastDuration } from "./namespaces/dialog";
export { PendingGalleryPick, PendingPhotoCapture, PendingVideoRecorder, type MediaType, type PickOptions } from "./namespaces/camera";
export { PendingScan, type ScanFormat } from "./namespaces/scanner";
export { PendingBiometric } from "./namespaces/biometrics";
export { PendingGeolocation, type GeolocationAction } from "./namespaces/geolocation";
export { PendingMicrophone } from "./namespaces/microphone";
export { PendingPushNotificationEnrollment, type PushPermissionStatus } from "./namespaces/push";
export { formatAmount, type PaymentIntentOptions, type PaymentSheetOptions } from "./namespaces/wallet";
export type { EdgeComponent } from "./namespaces/edge";
export type * from "./type";

// 挂载到全局，方便非模块化页面和原生端调试时使用
if (typeof window === "undefined") {
  console.warn("NativeBridge: window is undefined. unknown env.");
} else if (!window.nativeBridge) {
  window.nativeBridge = instance;
}

export default instance;
