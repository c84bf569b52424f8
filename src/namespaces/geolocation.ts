import { Methods } from "../methods";
import { PendingOperation, type PendingDefinition } from "../pending";
import type { BridgeCaller, BridgeParams } from "../type";

export type GeolocationAction = "getCurrentPosition" | "checkPermissions" | "requestPermissions";

const geolocationMethods: Record<GeolocationAction, string> = {
  getCurrentPosition: Methods.Geolocation.GetCurrentPosition,
  checkPermissions: Methods.Geolocation.CheckPermissions,
  requestPermissions: Methods.Geolocation.RequestPermissions,
};

type GeolocationFields = {
  action: GeolocationAction;
  fineAccuracy: boolean;
  remember: boolean;
};

const geolocationDefinition: PendingDefinition<GeolocationFields> = {
  method: ({ action }) => geolocationMethods[action],
  defaults: () => ({ action: "getCurrentPosition", fineAccuracy: false, remember: false }),
  // 只发送打开的开关
  params: ({ fineAccuracy, remember }) => {
    const params: BridgeParams = {};
    if (fineAccuracy) params.fineAccuracy = true;
    if (remember) params.remember = true;
    return params;
  },
};

/**
 * 三个定位动作共用同一种 builder，由构造时的 action 决定调用哪个方法
 */
export class PendingGeolocation extends PendingOperation<GeolocationFields> {
  constructor(bridge: BridgeCaller, action: GeolocationAction) {
    super(bridge, geolocationDefinition, { action });
  }

  public fineAccuracy(enabled = true): this {
    return this.set("fineAccuracy", enabled);
  }

  public remember(enabled = true): this {
    return this.set("remember", enabled);
  }
}

export function createGeolocation(bridge: BridgeCaller) {
  return {
    getCurrentPosition: () => new PendingGeolocation(bridge, "getCurrentPosition"),
    checkPermissions: () => new PendingGeolocation(bridge, "checkPermissions"),
    requestPermissions: () => new PendingGeolocation(bridge, "requestPermissions"),
  };
}
