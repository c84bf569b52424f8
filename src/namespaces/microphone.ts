import { Methods } from "../methods";
import { PendingOperation, type NoFields, type PendingDefinition } from "../pending";
import type { BridgeCaller } from "../type";

const microphoneDefinition: PendingDefinition<NoFields> = {
  method: Methods.Microphone.Start,
  defaults: () => ({}),
};

export class PendingMicrophone extends PendingOperation<NoFields> {
  constructor(bridge: BridgeCaller) {
    super(bridge, microphoneDefinition);
  }
}

export function createMicrophone(bridge: BridgeCaller) {
  return {
    record: () => new PendingMicrophone(bridge),
    stop: () => bridge.call(Methods.Microphone.Stop, {}),
    pause: () => bridge.call(Methods.Microphone.Pause, {}),
    resume: () => bridge.call(Methods.Microphone.Resume, {}),
    getStatus: () => bridge.call(Methods.Microphone.GetStatus, {}),
    getRecording: () => bridge.call(Methods.Microphone.GetRecording, {}),
  };
}
