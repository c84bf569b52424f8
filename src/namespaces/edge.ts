import { Methods } from "../methods";
import type { BridgeCaller, JsonValue } from "../type";

/**
 * 原生界面组件 (底部导航等) 的描述
 */
export type EdgeComponent = {
  type: string;
  data: { [key: string]: JsonValue };
};

function toList(components: EdgeComponent | EdgeComponent[]): EdgeComponent[] {
  return Array.isArray(components) ? components : [components];
}

export function createEdge(bridge: BridgeCaller) {
  return {
    set: (components: EdgeComponent | EdgeComponent[]) =>
      bridge.call(Methods.Edge.Set, { components: toList(components) }),
    /** 页面跳转时使用，无法 await 也能在卸载前发出 */
    setSync: (components: EdgeComponent | EdgeComponent[]): void =>
      bridge.callSync(Methods.Edge.Set, { components: toList(components) }),
    clear: () => bridge.call(Methods.Edge.Set, { components: [] }),
    clearSync: (): void => bridge.callSync(Methods.Edge.Set, { components: [] }),
  };
}
