import { Methods } from "../methods";
import { PendingOperation, type PendingDefinition } from "../pending";
import type { BridgeCaller, BridgeParams } from "../type";

type DialogFields = {
  title: string;
  message: string;
  buttons: string[];
};

const dialogDefinition: PendingDefinition<DialogFields> = {
  method: Methods.Dialog.Alert,
  defaults: () => ({ title: "", message: "", buttons: ["OK"] }),
};

/**
 * 原生弹窗的链式 builder，await 时弹出
 */
export class PendingDialog extends PendingOperation<DialogFields> {
  constructor(bridge: BridgeCaller) {
    super(bridge, dialogDefinition);
  }

  public title(title: string): this {
    return this.set("title", title);
  }

  public message(message: string): this {
    return this.set("message", message);
  }

  public buttons(buttons: string[]): this {
    return this.set("buttons", buttons);
  }

  /**
   * 确认弹窗 (Cancel / OK)
   */
  public confirm(title: string, message: string): this {
    return this.set("title", title).set("message", message).set("buttons", ["Cancel", "OK"]);
  }

  /**
   * 危险操作确认 (Cancel / Delete)
   */
  public confirmDelete(title: string, message: string): this {
    return this.set("title", title).set("message", message).set("buttons", ["Cancel", "Delete"]);
  }
}

export type AlertArgs = [title: string, message: string, buttons?: string[], id?: string, event?: string];

export type ToastDuration = "short" | "long";

export function createDialog(bridge: BridgeCaller) {
  /**
   * 立即弹出原生 alert
   */
  function alertNow(...[title, message, buttons, id, event]: AlertArgs): Promise<void> {
    const params: BridgeParams = { title, message, buttons: buttons ?? ["OK"] };
    if (id) params.id = id;
    if (event) params.event = event;
    return bridge.call<void>(Methods.Dialog.Alert, params);
  }

  /**
   * 不传参数时返回 builder，传参数时立即执行
   *
   * @example
   * await Dialog.alert('Title', 'Message');
   * await Dialog.alert().title('Title').message('Message').buttons(['Cancel', 'OK']);
   */
  function alert(): PendingDialog;
  function alert(...args: AlertArgs): Promise<void>;
  function alert(...args: [] | AlertArgs): PendingDialog | Promise<void> {
    if (args.length === 0) {
      return new PendingDialog(bridge);
    }
    return alertNow(...args);
  }

  /**
   * 显示一条 toast，默认时长为 "long"
   */
  function toast(message: string, duration: ToastDuration = "long") {
    return bridge.call<{ success: boolean }>(Methods.Dialog.Toast, { message, duration });
  }

  return { alert, alertNow, toast };
}
