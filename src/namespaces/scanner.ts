import { Methods } from "../methods";
import { PendingOperation, type PendingDefinition } from "../pending";
import type { BridgeCaller } from "../type";

export type ScanFormat = "qr" | "ean13" | "ean8" | "code128" | "code39" | "upca" | "upce" | "all";

type ScanFields = {
  prompt: string | null;
  continuous: boolean;
  formats: ScanFormat[];
};

const scanDefinition: PendingDefinition<ScanFields> = {
  method: Methods.QrCode.Scan,
  defaults: () => ({ prompt: null, continuous: false, formats: ["qr"] }),
  params: ({ prompt, continuous, formats }) => ({
    prompt: prompt ?? "Scan QR Code",
    continuous,
    formats,
  }),
};

/**
 * 二维码 / 条码扫描，结果通过 Events.Scanner.CodeScanned 返回
 */
export class PendingScan extends PendingOperation<ScanFields> {
  constructor(bridge: BridgeCaller) {
    super(bridge, scanDefinition);
  }

  /** 扫描界面上显示的提示文字 */
  public prompt(text: string): this {
    return this.set("prompt", text);
  }

  /** 连续扫描多个码而不关闭扫描界面 */
  public continuous(enabled = true): this {
    return this.set("continuous", enabled);
  }

  public formats(formats: ScanFormat[]): this {
    return this.set("formats", formats);
  }
}

export function createScanner(bridge: BridgeCaller) {
  return {
    scan: () => new PendingScan(bridge),
  };
}
