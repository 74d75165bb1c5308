import { registerPlugin, type PluginListenerHandle } from "@capacitor/core";
import type { SurfaceSettings } from "@/lib/definitions";

type SurfaceTarget = { surfaceId: string };

export type FileChooserRequestedEvent = SurfaceTarget & {
  requestId: string;
  acceptTypes: string[];
  allowMultiple: boolean;
};

export type SurfaceUrlEvent = SurfaceTarget & { url: string };

export interface EmbeddedBrowserPlugin {
  /**
   * Attach a new native web view to the activity layout. Every other call
   * and every event names the view by the returned id, so a late `destroy`
   * only ever removes the view it was issued for.
   */
  create(): Promise<SurfaceTarget>;

  configure(options: SurfaceTarget & { settings: SurfaceSettings }): Promise<void>;

  /**
   * When enabled, link clicks raise `navigationRequested` instead of being
   * loaded by the web view on its own.
   */
  setNavigationInterception(
    options: SurfaceTarget & { enabled: boolean }
  ): Promise<void>;

  /**
   * When enabled, file inputs raise `fileChooserRequested` and wait for
   * `resolveFileChooser` or `declineFileChooser`.
   */
  setFileChooserInterception(
    options: SurfaceTarget & { enabled: boolean }
  ): Promise<void>;

  loadUrl(options: SurfaceTarget & { url: string }): Promise<void>;
  canGoBack(options: SurfaceTarget): Promise<{ value: boolean }>;
  goBack(options: SurfaceTarget): Promise<void>;

  resolveFileChooser(
    options: SurfaceTarget & { requestId: string; uris: string[] | null }
  ): Promise<void>;

  /**
   * Let the web view fall back to its default handling of the request.
   */
  declineFileChooser(
    options: SurfaceTarget & { requestId: string }
  ): Promise<void>;

  destroy(options: SurfaceTarget): Promise<void>;

  addListener(
    eventName: "pageFinished",
    listenerFunc: (event: SurfaceUrlEvent) => void
  ): Promise<PluginListenerHandle>;
  addListener(
    eventName: "navigationRequested",
    listenerFunc: (event: SurfaceUrlEvent) => void
  ): Promise<PluginListenerHandle>;
  addListener(
    eventName: "fileChooserRequested",
    listenerFunc: (event: FileChooserRequestedEvent) => void
  ): Promise<PluginListenerHandle>;
}

export const EmbeddedBrowser =
  registerPlugin<EmbeddedBrowserPlugin>("EmbeddedBrowser");
