import { registerPlugin, type PluginListenerHandle } from "@capacitor/core";
import type { ActivityResult, PickerIntent } from "@/lib/definitions";

export interface MediaPickerPlugin {
  /**
   * Start the OS picker activity. Rejects if no activity can handle the
   * intent; the selection arrives later as an `activityResult` event.
   */
  launch(options: { intent: PickerIntent; requestCode: number }): Promise<void>;

  addListener(
    eventName: "activityResult",
    listenerFunc: (event: ActivityResult) => void
  ): Promise<PluginListenerHandle>;
}

export const MediaPicker = registerPlugin<MediaPickerPlugin>("MediaPicker");
