import { Methods } from "../methods";
import type { BridgeCaller } from "../type";

export function createBrowser(bridge: BridgeCaller) {
  async function open(method: string, url: string): Promise<boolean> {
    const result = await bridge.call<{ success?: boolean }>(method, { url });
    return result?.success === true;
  }

  return {
    /** 用系统默认浏览器打开 */
    open: (url: string) => open(Methods.Browser.Open, url),
    /** 应用内浏览器 (iOS SFSafariViewController / Android Custom Tabs) */
    inApp: (url: string) => open(Methods.Browser.OpenInApp, url),
    /** 认证会话，OAuth 回调由原生端处理 */
    auth: (url: string) => open(Methods.Browser.OpenAuth, url),
  };
}

export function createShare(bridge: BridgeCaller) {
  return {
    file: (title: string, message: string, path: string) =>
      bridge.call(Methods.Share.File, { title, message, filePath: path }),
    url: (title: string, text: string, url: string) => bridge.call(Methods.Share.Url, { title, text, url }),
  };
}
