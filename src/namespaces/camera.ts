import { Methods } from "../methods";
import { compactParams, PendingOperation, type NoFields, type PendingDefinition } from "../pending";
import type { BridgeCaller } from "../type";

export type MediaType = "all" | "image" | "video";

type GalleryFields = {
  mediaType: MediaType;
  multiple: boolean;
  maxItems: number;
};

type VideoFields = {
  maxDuration: number | null;
};

const galleryDefinition: PendingDefinition<GalleryFields> = {
  method: Methods.Camera.PickMedia,
  defaults: () => ({ mediaType: "all", multiple: false, maxItems: 10 }),
};

const photoDefinition: PendingDefinition<NoFields> = {
  method: Methods.Camera.GetPhoto,
  defaults: () => ({}),
};

const videoDefinition: PendingDefinition<VideoFields> = {
  method: Methods.Camera.RecordVideo,
  defaults: () => ({ maxDuration: null }),
};

/**
 * 从相册选择图片 / 视频
 */
export class PendingGalleryPick extends PendingOperation<GalleryFields> {
  constructor(bridge: BridgeCaller) {
    super(bridge, galleryDefinition);
  }

  public images(): this {
    return this.set("mediaType", "image");
  }

  public videos(): this {
    return this.set("mediaType", "video");
  }

  public all(): this {
    return this.set("mediaType", "all");
  }

  public multiple(enabled = true): this {
    return this.set("multiple", enabled);
  }

  /** 多选时最多可选数量 */
  public maxItems(max: number): this {
    return this.set("maxItems", max);
  }
}

export class PendingPhotoCapture extends PendingOperation<NoFields> {
  constructor(bridge: BridgeCaller) {
    super(bridge, photoDefinition);
  }
}

export class PendingVideoRecorder extends PendingOperation<VideoFields> {
  constructor(bridge: BridgeCaller) {
    super(bridge, videoDefinition);
  }

  /** 最长录制秒数，不设置时由原生端决定 */
  public maxDuration(seconds: number): this {
    return this.set("maxDuration", seconds);
  }
}

export type PickOptions = {
  id?: string;
  event?: string;
  multiple?: boolean;
  maxItems?: number;
};

export function createCamera(bridge: BridgeCaller) {
  return {
    getPhoto: () => new PendingPhotoCapture(bridge),
    recordVideo: () => new PendingVideoRecorder(bridge),
    pickImages: () => new PendingGalleryPick(bridge),
  };
}

/**
 * 不需要 builder 时的快捷选择，传入的 options 覆盖默认值
 */
export function createGallery(bridge: BridgeCaller) {
  function pick(defaults: GalleryFields, options: PickOptions): Promise<void> {
    return bridge.call<void>(Methods.Camera.PickMedia, { ...defaults, ...compactParams(options) });
  }

  return {
    pick: () => new PendingGalleryPick(bridge),
    pickImage: (options: PickOptions = {}) => pick({ mediaType: "image", multiple: false, maxItems: 1 }, options),
    pickImages: (options: PickOptions = {}) => pick({ mediaType: "image", multiple: true, maxItems: 10 }, options),
    pickVideo: (options: PickOptions = {}) => pick({ mediaType: "video", multiple: false, maxItems: 1 }, options),
    pickVideos: (options: PickOptions = {}) => pick({ mediaType: "video", multiple: true, maxItems: 10 }, options),
    pickMedia: (options: PickOptions = {}) => pick({ mediaType: "all", multiple: false, maxItems: 10 }, options),
  };
}
