/**
 * 所有内置 bridge 方法名，每个命名空间的动作一一对应其中一个
 */
export const Methods = {
  Dialog: {
    Alert: "Dialog.Alert",
    Toast: "Dialog.Toast",
  },
  Device: {
    Vibrate: "Device.Vibrate",
    ToggleFlashlight: "Device.ToggleFlashlight",
    GetId: "Device.GetId",
    GetInfo: "Device.GetInfo",
    GetBatteryInfo: "Device.GetBatteryInfo",
  },
  Network: {
    Status: "Network.Status",
  },
  Browser: {
    Open: "Browser.Open",
    OpenInApp: "Browser.OpenInApp",
    OpenAuth: "Browser.OpenAuth",
  },
  QrCode: {
    Scan: "QrCode.Scan",
  },
  Camera: {
    GetPhoto: "Camera.GetPhoto",
    RecordVideo: "Camera.RecordVideo",
    PickMedia: "Camera.PickMedia",
  },
  Biometric: {
    Prompt: "Biometric.Prompt",
  },
  Geolocation: {
    GetCurrentPosition: "Geolocation.GetCurrentPosition",
    CheckPermissions: "Geolocation.CheckPermissions",
    RequestPermissions: "Geolocation.RequestPermissions",
  },
  Microphone: {
    Start: "Microphone.Start",
    Stop: "Microphone.Stop",
    Pause: "Microphone.Pause",
    Resume: "Microphone.Resume",
    GetStatus: "Microphone.GetStatus",
    GetRecording: "Microphone.GetRecording",
  },
  PushNotification: {
    RequestPermission: "PushNotification.RequestPermission",
    CheckPermission: "PushNotification.CheckPermission",
    GetToken: "PushNotification.GetToken",
  },
  Share: {
    File: "Share.File",
    Url: "Share.Url",
  },
  SecureStorage: {
    Set: "SecureStorage.Set",
    Get: "SecureStorage.Get",
    Delete: "SecureStorage.Delete",
  },
  File: {
    Move: "File.Move",
    Copy: "File.Copy",
  },
  Edge: {
    Set: "Edge.Set",
  },
  MobileWallet: {
    IsAvailable: "MobileWallet.IsAvailable",
    CreatePaymentIntent: "MobileWallet.CreatePaymentIntent",
    PresentPaymentSheet: "MobileWallet.PresentPaymentSheet",
    ConfirmPayment: "MobileWallet.ConfirmPayment",
    GetPaymentStatus: "MobileWallet.GetPaymentStatus",
  },
} as const;
