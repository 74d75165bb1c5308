import type { FileChooserConfig } from "@/config/shell-config";
import {
  createUploadSlotStore,
  type UploadSlotStore,
} from "@/store/upload-slot-store";
import type {
  ActivityResult,
  ChromeClient,
  FileChooserCallback,
  FileChooserParams,
  FileSelection,
  PickerIntent,
  PickerLauncher,
} from "./definitions";

/**
 * Translate a picker round-trip into what the page receives.
 */
export function selectionFromResult(result: ActivityResult): FileSelection {
  if (result.resultCode !== "ok" || !result.data) return null;

  const { dataString } = result.data;
  return dataString ? [dataString] : [];
}

/**
 * Routes the surface's file-input requests to the OS image picker.
 * Holds at most one pending callback.
 */
export class FileChooserBridge implements ChromeClient {
  readonly slot: UploadSlotStore = createUploadSlotStore();

  constructor(
    private readonly launcher: PickerLauncher,
    private readonly config: FileChooserConfig
  ) {}

  get isAwaitingResult(): boolean {
    return this.slot.getState().pending !== null;
  }

  createIntent(): PickerIntent {
    return { mimeType: this.config.mimeType, allowMultiple: false };
  }

  async onShowFileChooser(
    callback: FileChooserCallback,
    params: FileChooserParams
  ): Promise<boolean> {
    const superseded = this.slot.getState().take();
    if (superseded) {
      console.warn(
        "[FileChooser] New request while one was pending, resolving the previous one empty"
      );
      superseded(null);
    }

    const intent = this.createIntent();
    console.log(
      `[FileChooser] Launching picker (${intent.mimeType}), page accepts: ${
        params.acceptTypes.join(",") || "*"
      }`
    );

    this.slot.getState().hold(callback);
    try {
      await this.launcher.launch(intent, this.config.requestCode);
    } catch (error) {
      console.error("[FileChooser] Failed to launch picker:", error);
      this.slot.getState().release(callback);
      return false;
    }
    return true;
  }

  /**
   * @returns whether the result belonged to this bridge's request code
   */
  onActivityResult(result: ActivityResult): boolean {
    if (result.requestCode !== this.config.requestCode) return false;

    const callback = this.slot.getState().take();
    if (!callback) {
      console.warn(
        `[FileChooser] Dropping picker result (${result.resultCode}), no request pending`
      );
      return true;
    }

    callback(selectionFromResult(result));
    return true;
  }
}
