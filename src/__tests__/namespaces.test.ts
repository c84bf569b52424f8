import { describe, expect, it, vi } from "vitest";
import { Events } from "../catalog";
import { BridgeValidationError } from "../errors";
import { formatAmount } from "../namespaces/wallet";
import { createTestNative } from "./helpers/fakeHost";

describe("Camera and Gallery", () => {
  it("captures photos and videos with their identity fields", async () => {
    const { host, native } = createTestNative();

    await native.Camera.getPhoto().id("profile");
    await native.Camera.recordVideo();
    await native.Camera.recordVideo().maxDuration(30).event("App\\Events\\ClipReady");

    expect(host.requests.map((request) => request.envelope)).toEqual([
      { method: "Camera.GetPhoto", params: { id: "profile" } },
      { method: "Camera.RecordVideo", params: {} },
      { method: "Camera.RecordVideo", params: { maxDuration: 30, event: "App\\Events\\ClipReady" } },
    ]);
  });

  it("builds gallery picks with default buckets", async () => {
    const { host, native } = createTestNative();

    await native.Camera.pickImages();
    await native.Gallery.pick().images().multiple().maxItems(5).id("avatar");
    await native.Gallery.pick().videos().multiple(false);

    expect(host.requests[0].envelope).toEqual({
      method: "Camera.PickMedia",
      params: { mediaType: "all", multiple: false, maxItems: 10 },
    });
    expect(host.requests[1].envelope.params).toEqual({ mediaType: "image", multiple: true, maxItems: 5, id: "avatar" });
    expect(host.requests[2].envelope.params).toEqual({ mediaType: "video", multiple: false, maxItems: 10 });
  });

  it("picks immediately with options overriding the defaults", async () => {
    const { host, native } = createTestNative();

    await native.Gallery.pickImage();
    await native.Gallery.pickImages({ maxItems: 3, id: "album" });
    await native.Gallery.pickVideo({ event: "App\\Events\\VideoPicked" });
    await native.Gallery.pickVideos();
    await native.Gallery.pickMedia({ multiple: true });

    expect(host.requests.map((request) => request.envelope.params)).toEqual([
      { mediaType: "image", multiple: false, maxItems: 1 },
      { mediaType: "image", multiple: true, maxItems: 3, id: "album" },
      { mediaType: "video", multiple: false, maxItems: 1, event: "App\\Events\\VideoPicked" },
      { mediaType: "video", multiple: true, maxItems: 10 },
      { mediaType: "all", multiple: true, maxItems: 10 },
    ]);
    expect(host.requests.every((request) => request.envelope.method === "Camera.PickMedia")).toBe(true);
  });
});

describe("Scanner", () => {
  it("fills the default prompt and formats", async () => {
    const { host, native } = createTestNative();

    await native.Scanner.scan();
    await native.Scanner.scan().prompt("Scan your ticket").continuous().formats(["qr", "ean13"]).id("ticket-scanner");

    expect(host.requests[0].envelope).toEqual({
      method: "QrCode.Scan",
      params: { prompt: "Scan QR Code", continuous: false, formats: ["qr"] },
    });
    expect(host.requests[1].envelope.params).toEqual({
      prompt: "Scan your ticket",
      continuous: true,
      formats: ["qr", "ean13"],
      id: "ticket-scanner",
    });
  });
});

describe("Geolocation", () => {
  it("maps each action to its own method", async () => {
    const { host, native } = createTestNative();

    await native.Geolocation.getCurrentPosition().fineAccuracy().id("checkin");
    await native.Geolocation.checkPermissions();
    await native.Geolocation.requestPermissions().remember();

    expect(host.requests.map((request) => request.envelope)).toEqual([
      { method: "Geolocation.GetCurrentPosition", params: { fineAccuracy: true, id: "checkin" } },
      { method: "Geolocation.CheckPermissions", params: {} },
      { method: "Geolocation.RequestPermissions", params: { remember: true } },
    ]);
  });

  it("omits switches that are turned off", async () => {
    const { host, native } = createTestNative();

    await native.Geolocation.getCurrentPosition().fineAccuracy(false).remember(false);

    expect(host.last()).toEqual({ method: "Geolocation.GetCurrentPosition", params: {} });
  });
});

describe("Biometrics and Microphone", () => {
  it("prompts through either namespace name", async () => {
    const { host, native } = createTestNative();

    expect(native.Biometric).toBe(native.Biometrics);
    await native.Biometric.prompt().id("unlock");

    expect(host.last()).toEqual({ method: "Biometric.Prompt", params: { id: "unlock" } });
  });

  it("starts recording with a builder and controls it immediately", async () => {
    const { host, native } = createTestNative();
    host.succeed();
    host.succeed();
    host.succeed();
    host.succeed();
    host.succeed({ status: "recording" });

    await native.Microphone.record().id("memo");
    await native.Microphone.pause();
    await native.Microphone.resume();
    await native.Microphone.stop();
    await expect(native.Microphone.getStatus()).resolves.toEqual({ status: "recording" });
    await native.Microphone.getRecording();

    expect(host.requests.map((request) => request.envelope.method)).toEqual([
      "Microphone.Start",
      "Microphone.Pause",
      "Microphone.Resume",
      "Microphone.Stop",
      "Microphone.GetStatus",
      "Microphone.GetRecording",
    ]);
    expect(host.requests[0].envelope.params).toEqual({ id: "memo" });
  });
});

describe("PushNotifications", () => {
  it("enrolls with a generated id and the token event", async () => {
    const { host, native } = createTestNative();
    const enrollment = native.PushNotifications.enroll();

    const id = enrollment.getId();
    await enrollment;

    expect(id).toMatch(/^[A-Za-z0-9_-]{21}$/);
    expect(enrollment.getId()).toBe(id);
    expect(host.last()).toEqual({
      method: "PushNotification.RequestPermission",
      params: { id, event: Events.PushNotification.TokenGenerated },
    });
  });

  it("keeps a caller supplied id and event", async () => {
    const { host, native } = createTestNative();

    await native.PushNotifications.enroll().id("push-1").event("App\\Events\\TokenReady");

    expect(host.last()?.params).toEqual({ id: "push-1", event: "App\\Events\\TokenReady" });
  });

  it("generates the id when remembered", () => {
    const { host, native } = createTestNative();

    const enrollment = native.PushNotifications.enroll().remember();

    expect(enrollment.getId()).toEqual(expect.any(String));
    expect(host.fetch).not.toHaveBeenCalled();
  });

  it("reads the permission status and token", async () => {
    const { host, native } = createTestNative();
    host.succeed({ status: "granted" });
    host.succeed();
    host.succeed({ token: "test-token" });
    host.succeed({ token: "" });

    await expect(native.PushNotifications.checkPermission()).resolves.toBe("granted");
    await expect(native.PushNotifications.checkPermission()).resolves.toBeNull();
    await expect(native.PushNotifications.getToken()).resolves.toBe("test-token");
    await expect(native.PushNotifications.getToken()).resolves.toBeNull();
    expect(host.requests.map((request) => request.envelope.method)).toEqual([
      "PushNotification.CheckPermission",
      "PushNotification.CheckPermission",
      "PushNotification.GetToken",
      "PushNotification.GetToken",
    ]);
  });
});

describe("SecureStorage and File", () => {
  it("sends a null value instead of omitting it", async () => {
    const { host, native } = createTestNative();

    await native.SecureStorage.set("session", null);

    expect(host.last()).toEqual({ method: "SecureStorage.Set", params: { key: "session", value: null } });
    expect(host.last()?.params).toHaveProperty("value", null);
  });

  it("reads, writes and deletes keys", async () => {
    const { host, native } = createTestNative();
    host.succeed({ success: true });
    host.succeed({ value: "test-secret" });

    await native.SecureStorage.set("api", "test-secret");
    await expect(native.SecureStorage.get("api")).resolves.toEqual({ value: "test-secret" });
    await native.SecureStorage.delete("api");

    expect(host.requests.map((request) => request.envelope)).toEqual([
      { method: "SecureStorage.Set", params: { key: "api", value: "test-secret" } },
      { method: "SecureStorage.Get", params: { key: "api" } },
      { method: "SecureStorage.Delete", params: { key: "api" } },
    ]);
  });

  it("moves and copies files", async () => {
    const { host, native } = createTestNative();

    await native.File.move("/tmp/a.jpg", "/data/a.jpg");
    await native.File.copy("/data/a.jpg", "/data/b.jpg");

    expect(host.requests.map((request) => request.envelope)).toEqual([
      { method: "File.Move", params: { from: "/tmp/a.jpg", to: "/data/a.jpg" } },
      { method: "File.Copy", params: { from: "/data/a.jpg", to: "/data/b.jpg" } },
    ]);
  });
});

describe("Share and Browser", () => {
  it("shares files and links", async () => {
    const { host, native } = createTestNative();

    await native.Share.file("Report", "See attached", "/data/report.pdf");
    await native.Share.url("Docs", "Read this", "https://example.com/docs");

    expect(host.requests.map((request) => request.envelope)).toEqual([
      { method: "Share.File", params: { title: "Report", message: "See attached", filePath: "/data/report.pdf" } },
      { method: "Share.Url", params: { title: "Docs", text: "Read this", url: "https://example.com/docs" } },
    ]);
  });

  it("reports whether the browser opened", async () => {
    const { host, native } = createTestNative();
    host.succeed({ success: true });
    host.succeed();
    host.succeed({ success: false });

    await expect(native.Browser.open("https://example.com")).resolves.toBe(true);
    await expect(native.Browser.inApp("https://example.com")).resolves.toBe(false);
    await expect(native.Browser.auth("https://example.com/login")).resolves.toBe(false);
    expect(host.requests.map((request) => request.envelope.method)).toEqual([
      "Browser.Open",
      "Browser.OpenInApp",
      "Browser.OpenAuth",
    ]);
    expect(host.requests[2].envelope.params).toEqual({ url: "https://example.com/login" });
  });
});

describe("Device, Haptics, System and Network", () => {
  it("maps device actions to their methods", async () => {
    const { host, native } = createTestNative();

    await native.Device.vibrate();
    await native.Haptics.vibrate();
    await native.Device.flashlight();
    await native.Device.getId();
    await native.Device.getInfo();
    await native.Device.getBatteryInfo();
    await native.Network.status();

    expect(host.requests.map((request) => request.envelope)).toEqual([
      { method: "Device.Vibrate", params: {} },
      { method: "Device.Vibrate", params: {} },
      { method: "Device.ToggleFlashlight", params: {} },
      { method: "Device.GetId", params: {} },
      { method: "Device.GetInfo", params: {} },
      { method: "Device.GetBatteryInfo", params: {} },
      { method: "Network.Status", params: {} },
    ]);
  });

  it("detects the platform from device info", async () => {
    const { host, native } = createTestNative();
    host.succeed({ info: JSON.stringify({ platform: "ios" }) });
    host.succeed({ info: JSON.stringify({ platform: "ios" }) });
    host.succeed({ info: JSON.stringify({ platform: "android" }) });
    host.succeed({});
    host.succeed({ info: JSON.stringify({ model: "Pixel" }) });

    await expect(native.System.isIos()).resolves.toBe(true);
    await expect(native.System.isAndroid()).resolves.toBe(false);
    await expect(native.System.isMobile()).resolves.toBe(true);
    await expect(native.System.isMobile()).resolves.toBe(false);
    await expect(native.System.isIos()).resolves.toBe(false);
    expect(host.requests.every((request) => request.envelope.method === "Device.GetInfo")).toBe(true);
  });

  it("keeps the legacy flashlight on System", async () => {
    const { host, native } = createTestNative();

    await native.System.flashlight();

    expect(host.last()?.method).toBe("Device.ToggleFlashlight");
  });
});

describe("Edge", () => {
  it("wraps a single component and clears with an empty list", async () => {
    const { host, native } = createTestNative();
    const nav = { type: "bottom_nav", data: { id: "bottom_nav", label_visibility: "labeled" } };

    await native.Edge.set(nav);
    await native.Edge.set([nav, nav]);
    await native.Edge.clear();

    expect(host.requests.map((request) => request.envelope)).toEqual([
      { method: "Edge.Set", params: { components: [nav] } },
      { method: "Edge.Set", params: { components: [nav, nav] } },
      { method: "Edge.Set", params: { components: [] } },
    ]);
  });

  it("uses the synchronous transport for setSync and clearSync", () => {
    const { host, native } = createTestNative();
    const nav = { type: "bottom_nav", data: { id: "bottom_nav" } };

    native.Edge.setSync(nav);
    native.Edge.clearSync();

    expect(host.fetch).not.toHaveBeenCalled();
    expect(host.syncRequests.map((request) => request.envelope)).toEqual([
      { method: "Edge.Set", params: { components: [nav] } },
      { method: "Edge.Set", params: { components: [] } },
    ]);
  });
});

describe("MobileWallet", () => {
  it("creates payment intents with default currency and metadata", async () => {
    const { host, native } = createTestNative();

    await native.MobileWallet.createPaymentIntent({ amount: 1999 });
    await native.MobileWallet.createPaymentIntent({ amount: 500, currency: "eur", metadata: { order: "A-1" } });

    expect(host.requests.map((request) => request.envelope)).toEqual([
      { method: "MobileWallet.CreatePaymentIntent", params: { amount: 1999, currency: "usd", metadata: {} } },
      {
        method: "MobileWallet.CreatePaymentIntent",
        params: { amount: 500, currency: "eur", metadata: { order: "A-1" } },
      },
    ]);
  });

  it("validates the payment sheet before calling the host", async () => {
    const { host, native } = createTestNative();

    const sheet = native.MobileWallet.presentPaymentSheet({
      clientSecret: "test-secret",
      merchantDisplayName: "Test Shop",
    });

    await expect(sheet).rejects.toBeInstanceOf(BridgeValidationError);
    await expect(sheet).rejects.toMatchObject({ message: "publishableKey is required", field: "publishableKey" });
    await expect(native.MobileWallet.confirmPayment("")).rejects.toMatchObject({
      message: "paymentIntentId is required",
    });
    await expect(native.MobileWallet.getPaymentStatus("")).rejects.toMatchObject({
      message: "paymentIntentId is required",
    });
    expect(host.fetch).not.toHaveBeenCalled();
  });

  it("presents the payment sheet and follows up on the intent", async () => {
    const { host, native } = createTestNative();

    await native.MobileWallet.isAvailable();
    await native.MobileWallet.presentPaymentSheet({
      clientSecret: "test-secret",
      merchantDisplayName: "Test Shop",
      publishableKey: "test-key",
      additionalOptions: { allowsDelayedPaymentMethods: true },
    });
    await native.MobileWallet.confirmPayment("pi_test");
    await native.MobileWallet.getPaymentStatus("pi_test");

    expect(host.requests.map((request) => request.envelope)).toEqual([
      { method: "MobileWallet.IsAvailable", params: {} },
      {
        method: "MobileWallet.PresentPaymentSheet",
        params: {
          clientSecret: "test-secret",
          merchantDisplayName: "Test Shop",
          publishableKey: "test-key",
          options: { allowsDelayedPaymentMethods: true },
        },
      },
      { method: "MobileWallet.ConfirmPayment", params: { paymentIntentId: "pi_test" } },
      { method: "MobileWallet.GetPaymentStatus", params: { paymentIntentId: "pi_test" } },
    ]);
  });

  it("formats amounts in minor units", () => {
    expect(formatAmount(1999)).toBe("$19.99");
    expect(formatAmount(500, "eur")).toBe("€5.00");
  });
});

describe("bridgeCall and events", () => {
  it("calls custom plugin methods", async () => {
    const { host, native } = createTestNative();
    host.succeed({ echoed: "bar" });

    await expect(native.bridgeCall("MyPlugin.CustomAction", { foo: "bar" })).resolves.toEqual({ echoed: "bar" });
    native.bridgeCallSync("MyPlugin.Flush");

    expect(host.last()).toEqual({ method: "MyPlugin.CustomAction", params: { foo: "bar" } });
    expect(host.syncRequests[0].envelope).toEqual({ method: "MyPlugin.Flush", params: {} });
  });

  it("routes On and Off through the bus", () => {
    const { bus, native } = createTestNative();
    const listener = vi.fn();

    native.On(native.Events.Gallery.MediaSelected, listener);
    bus.dispatch("\\Native\\Mobile\\Events\\Gallery\\MediaSelected", { files: ["/tmp/a.jpg"] });
    native.Off(native.Events.Gallery.MediaSelected, listener);
    bus.dispatch(Events.Gallery.MediaSelected, { files: [] });

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({ files: ["/tmp/a.jpg"] }, Events.Gallery.MediaSelected);
  });
});
