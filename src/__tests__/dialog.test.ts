import { describe, expect, it } from "vitest";
import { NativeCallError } from "../errors";
import { PendingDialog } from "../namespaces/dialog";
import { createTestNative } from "./helpers/fakeHost";

describe("Dialog.alert", () => {
  it("sends the alert immediately when called with arguments", async () => {
    const { host, native } = createTestNative();
    host.succeed();

    const result = native.Dialog.alert("Title", "Body");

    expect(result).toBeInstanceOf(Promise);
    await expect(result).resolves.toBeUndefined();
    expect(host.requests).toHaveLength(1);
    expect(host.last()).toEqual({
      method: "Dialog.Alert",
      params: { title: "Title", message: "Body", buttons: ["OK"] },
    });
  });

  it("returns a builder when called without arguments", async () => {
    const { host, native } = createTestNative();

    const dialog = native.Dialog.alert();

    expect(dialog).toBeInstanceOf(PendingDialog);
    expect(host.fetch).not.toHaveBeenCalled();

    await dialog.title("T").message("M").buttons(["Cancel", "OK"]);

    expect(host.requests).toHaveLength(1);
    expect(host.last()).toEqual({
      method: "Dialog.Alert",
      params: { title: "T", message: "M", buttons: ["Cancel", "OK"] },
    });
  });

  it("passes id and event through the immediate form", async () => {
    const { host, native } = createTestNative();

    await native.Dialog.alert("Delete?", "This cannot be undone", ["No", "Yes"], "delete-1", "App\\Events\\Answered");

    expect(host.last()).toEqual({
      method: "Dialog.Alert",
      params: {
        title: "Delete?",
        message: "This cannot be undone",
        buttons: ["No", "Yes"],
        id: "delete-1",
        event: "App\\Events\\Answered",
      },
    });
  });

  it("sends the same envelope through alertNow", async () => {
    const { host, native } = createTestNative();

    await native.Dialog.alertNow("Title", "Body");

    expect(host.last()).toEqual({
      method: "Dialog.Alert",
      params: { title: "Title", message: "Body", buttons: ["OK"] },
    });
  });

  it("fills confirm and confirmDelete buttons", async () => {
    const { host, native } = createTestNative();

    await native.Dialog.alert().confirm("Leave?", "Unsaved changes");
    await native.Dialog.alert().confirmDelete("Delete photo?", "It will be gone").id("photo-7");

    expect(host.requests[0].envelope.params).toEqual({
      title: "Leave?",
      message: "Unsaved changes",
      buttons: ["Cancel", "OK"],
    });
    expect(host.requests[1].envelope.params).toEqual({
      title: "Delete photo?",
      message: "It will be gone",
      buttons: ["Cancel", "Delete"],
      id: "photo-7",
    });
  });

  it("rejects both forms with the host error message", async () => {
    const { host, native } = createTestNative();
    host.fail("Denied");
    host.fail("Denied");

    await expect(native.Dialog.alert("Title", "Body")).rejects.toMatchObject({ message: "Denied" });
    await expect(Promise.resolve(native.Dialog.alert().title("T"))).rejects.toBeInstanceOf(NativeCallError);
  });
});

describe("Dialog.toast", () => {
  it("defaults the duration to long", async () => {
    const { host, native } = createTestNative();
    host.succeed({ success: true });

    await expect(native.Dialog.toast("Saved")).resolves.toEqual({ success: true });
    await native.Dialog.toast("Copied", "short");

    expect(host.requests[0].envelope).toEqual({ method: "Dialog.Toast", params: { message: "Saved", duration: "long" } });
    expect(host.requests[1].envelope).toEqual({ method: "Dialog.Toast", params: { message: "Copied", duration: "short" } });
  });
});
