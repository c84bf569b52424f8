import { Methods } from "../methods";
import { PendingOperation, type NoFields, type PendingDefinition } from "../pending";
import type { BridgeCaller } from "../type";

const biometricDefinition: PendingDefinition<NoFields> = {
  method: Methods.Biometric.Prompt,
  defaults: () => ({}),
};

/**
 * Face ID / 指纹认证，结果通过 Events.Biometrics.Completed 返回
 */
export class PendingBiometric extends PendingOperation<NoFields> {
  constructor(bridge: BridgeCaller) {
    super(bridge, biometricDefinition);
  }
}

export function createBiometrics(bridge: BridgeCaller) {
  return {
    prompt: () => new PendingBiometric(bridge),
  };
}
