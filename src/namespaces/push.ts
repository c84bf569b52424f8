import { Events } from "../catalog";
import { Methods } from "../methods";
import { PendingOperation, type NoFields, type PendingDefinition } from "../pending";
import type { BridgeCaller } from "../type";

export type PushPermissionStatus = "granted" | "denied" | "not_determined" | "provisional" | "ephemeral";

const enrollmentDefinition: PendingDefinition<NoFields> = {
  method: Methods.PushNotification.RequestPermission,
  defaults: () => ({}),
  generateId: true,
  defaultEvent: Events.PushNotification.TokenGenerated,
};

/**
 * 申请推送权限并注册，token 通过 Events.PushNotification.TokenGenerated 返回
 */
export class PendingPushNotificationEnrollment extends PendingOperation<NoFields> {
  constructor(bridge: BridgeCaller) {
    super(bridge, enrollmentDefinition);
  }

  /**
   * 立即生成 ID，方便在发送前保存下来
   */
  public remember(): this {
    this.getId();
    return this;
  }
}

export function createPushNotifications(bridge: BridgeCaller) {
  return {
    enroll: () => new PendingPushNotificationEnrollment(bridge),
    /** 只查询当前权限，不会弹出授权提示 */
    checkPermission: async (): Promise<PushPermissionStatus | null> => {
      const result = await bridge.call<{ status?: PushPermissionStatus }>(Methods.PushNotification.CheckPermission, {});
      return result?.status ?? null;
    },
    /** iOS 为 APNS token，Android 为 FCM token */
    getToken: async (): Promise<string | null> => {
      const result = await bridge.call<{ token?: string }>(Methods.PushNotification.GetToken, {});
      // Android 没有 token 时返回空字符串
      return result?.token || null;
    },
  };
}
