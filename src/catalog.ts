/**
 * 原生端派发事件时使用的事件类名，配合 On() 使用，避免手写字符串
 *
 * @example
 * On(Events.Camera.PhotoTaken, (payload) => { ... });
 */
export const Events = {
  Alert: {
    ButtonPressed: "Native\\Mobile\\Events\\Alert\\ButtonPressed",
  },
  App: {
    UpdateInstalled: "Native\\Mobile\\Events\\App\\UpdateInstalled",
  },
  Camera: {
    PhotoTaken: "Native\\Mobile\\Events\\Camera\\PhotoTaken",
    PhotoCancelled: "Native\\Mobile\\Events\\Camera\\PhotoCancelled",
    VideoRecorded: "Native\\Mobile\\Events\\Camera\\VideoRecorded",
    VideoCancelled: "Native\\Mobile\\Events\\Camera\\VideoCancelled",
    PermissionDenied: "Native\\Mobile\\Events\\Camera\\PermissionDenied",
  },
  Gallery: {
    MediaSelected: "Native\\Mobile\\Events\\Gallery\\MediaSelected",
  },
  Biometrics: {
    Completed: "Native\\Mobile\\Events\\Biometrics\\BiometricCompleted",
  },
  Geolocation: {
    LocationReceived: "Native\\Mobile\\Events\\Geolocation\\LocationReceived",
    PermissionStatusReceived: "Native\\Mobile\\Events\\Geolocation\\PermissionStatusReceived",
    PermissionRequestResult: "Native\\Mobile\\Events\\Geolocation\\PermissionRequestResult",
  },
  Scanner: {
    CodeScanned: "Native\\Mobile\\Events\\Scanner\\CodeScanned",
    Cancelled: "Native\\Mobile\\Events\\Scanner\\ScannerCancelled",
  },
  Microphone: {
    Recorded: "Native\\Mobile\\Events\\Microphone\\MicrophoneRecorded",
    Cancelled: "Native\\Mobile\\Events\\Microphone\\MicrophoneCancelled",
  },
  PushNotification: {
    TokenGenerated: "Native\\Mobile\\Events\\PushNotification\\TokenGenerated",
  },
  Wallet: {
    PaymentCompleted: "Native\\Mobile\\Events\\Wallet\\PaymentCompleted",
    PaymentFailed: "Native\\Mobile\\Events\\Wallet\\PaymentFailed",
    PaymentCancelled: "Native\\Mobile\\Events\\Wallet\\PaymentCancelled",
  },
} as const;

type Catalog = typeof Events;

/** 目录中所有事件名的联合类型 */
export type NativeEventName = {
  [Domain in keyof Catalog]: Catalog[Domain][keyof Catalog[Domain]];
}[keyof Catalog];

// 旧版本的导出名
export const CoreEvents = Events;
