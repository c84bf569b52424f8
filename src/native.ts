import { CoreEvents, Events } from "./catalog";
import type { NativeEventBus } from "./events";
import { createBiometrics } from "./namespaces/biometrics";
import { createBrowser, createShare } from "./namespaces/browser";
import { createCamera, createGallery } from "./namespaces/camera";
import { createDevice, createNetwork, createSystem } from "./namespaces/device";
import { createDialog } from "./namespaces/dialog";
import { createEdge } from "./namespaces/edge";
import { createGeolocation } from "./namespaces/geolocation";
import { createMicrophone } from "./namespaces/microphone";
import { createPushNotifications } from "./namespaces/push";
import { createScanner } from "./namespaces/scanner";
import { createFile, createSecureStorage } from "./namespaces/storage";
import { createMobileWallet } from "./namespaces/wallet";
import type { BridgeCaller, BridgeParams, NativeEventCallback } from "./type";

/**
 * 把各个命名空间绑定到同一个 transport 和事件总线上
 *
 * @example
 * const native = createNative(new BridgeTransport({ debug: true }), new NativeEventBus());
 * await native.Dialog.alert('Hello', 'World');
 */
export function createNative(bridge: BridgeCaller, bus: NativeEventBus) {
  const Device = createDevice(bridge);
  const Biometrics = createBiometrics(bridge);

  return {
    /**
     * 调用任意已注册的 bridge 方法，插件的自定义方法也走这里
     */
    bridgeCall: <T = unknown>(method: string, params?: BridgeParams) => bridge.call<T>(method, params),
    bridgeCallSync: (method: string, params?: BridgeParams) => bridge.callSync(method, params),
    On: (eventName: string, callback: NativeEventCallback) => bus.on(eventName, callback),
    Off: (eventName: string, callback: NativeEventCallback) => bus.off(eventName, callback),
    Events,
    CoreEvents,

    Dialog: createDialog(bridge),
    Device,
    // 旧版本的命名空间，使用 Device.vibrate()
    Haptics: { vibrate: Device.vibrate },
    System: createSystem(Device),
    Network: createNetwork(bridge),
    Browser: createBrowser(bridge),
    Share: createShare(bridge),
    Scanner: createScanner(bridge),
    Camera: createCamera(bridge),
    Gallery: createGallery(bridge),
    Biometrics,
    Biometric: Biometrics,
    Geolocation: createGeolocation(bridge),
    Microphone: createMicrophone(bridge),
    PushNotifications: createPushNotifications(bridge),
    SecureStorage: createSecureStorage(bridge),
    File: createFile(bridge),
    Edge: createEdge(bridge),
    MobileWallet: createMobileWallet(bridge),
  };
}

export type NativeBridge = ReturnType<typeof createNative>;
