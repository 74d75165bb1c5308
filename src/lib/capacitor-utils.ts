import { App } from "@capacitor/app";
import type { PluginListenerHandle } from "@capacitor/core";
import { EmbeddedBrowser } from "@/plugins/embedded-browser";
import { MediaPicker } from "@/plugins/media-picker";
import { RuntimePermissions } from "@/plugins/runtime-permissions";
import type {
  BrowserSurface,
  ChromeClient,
  NavigationClient,
  PermissionGateway,
  PickerLauncher,
  ShellDeps,
  ShellPlatform,
  Unsubscribe,
} from "./definitions";

const toUnsubscribe =
  (handle: PluginListenerHandle): Unsubscribe =>
  () =>
    handle.remove();

// One native web view, addressed by the id `EmbeddedBrowser.create` returned.
// Events for other views are ignored.
export const createEmbeddedSurface = (surfaceId: string): BrowserSurface => {
  const handles: PluginListenerHandle[] = [];
  let destroyed = false;

  // A client installed after destroy() must not leave a live listener behind
  const track = async (handle: PluginListenerHandle): Promise<boolean> => {
    if (destroyed) {
      await handle.remove();
      return false;
    }
    handles.push(handle);
    return true;
  };

  return {
    configure: (settings) => EmbeddedBrowser.configure({ surfaceId, settings }),

    setChromeClient: async (client: ChromeClient) => {
      const handle = await EmbeddedBrowser.addListener(
        "fileChooserRequested",
        (event) => {
          if (event.surfaceId !== surfaceId) return;
          const { requestId, acceptTypes, allowMultiple } = event;

          const callback = (uris: string[] | null) => {
            EmbeddedBrowser.resolveFileChooser({ surfaceId, requestId, uris }).catch(
              (error) =>
                console.error("[EmbeddedBrowser] resolveFileChooser failed:", error)
            );
          };

          client
            .onShowFileChooser(callback, { acceptTypes, allowMultiple })
            .then((shown) =>
              shown
                ? undefined
                : EmbeddedBrowser.declineFileChooser({ surfaceId, requestId })
            )
            .catch((error) =>
              console.error("[EmbeddedBrowser] File chooser failed:", error)
            );
        }
      );
      if (!(await track(handle))) return;
      await EmbeddedBrowser.setFileChooserInterception({ surfaceId, enabled: true });
    },

    setNavigationClient: async (client: NavigationClient) => {
      const pageFinished = await EmbeddedBrowser.addListener(
        "pageFinished",
        (event) => {
          if (event.surfaceId === surfaceId) client.onPageFinished(event.url);
        }
      );
      if (!(await track(pageFinished))) return;

      const navigationRequested = await EmbeddedBrowser.addListener(
        "navigationRequested",
        ({ surfaceId: target, url }) => {
          if (target !== surfaceId) return;
          client
            .shouldOverrideUrlLoading(url)
            .catch((error) =>
              console.error(`[EmbeddedBrowser] Failed to load ${url}:`, error)
            );
        }
      );
      if (!(await track(navigationRequested))) return;
      await EmbeddedBrowser.setNavigationInterception({ surfaceId, enabled: true });
    },

    loadUrl: (url) => EmbeddedBrowser.loadUrl({ surfaceId, url }),

    canGoBack: async () => {
      const { value } = await EmbeddedBrowser.canGoBack({ surfaceId });
      return value;
    },

    goBack: () => EmbeddedBrowser.goBack({ surfaceId }),

    destroy: async () => {
      if (destroyed) return;
      destroyed = true;
      const pending = handles.splice(0);
      await Promise.all(pending.map((handle) => handle.remove()));
      await EmbeddedBrowser.destroy({ surfaceId });
    },
  };
};

const mediaPickerLauncher: PickerLauncher = {
  launch: (intent, requestCode) => MediaPicker.launch({ intent, requestCode }),
  onResult: async (handler) =>
    toUnsubscribe(await MediaPicker.addListener("activityResult", handler)),
};

const runtimePermissionGateway: PermissionGateway = {
  checkPermissions: () => RuntimePermissions.checkPermissions(),
  requestPermissions: async (permissions) => {
    await RuntimePermissions.requestPermissions({ permissions });
  },
};

// Registering a backButton listener turns off Capacitor's own back handling,
// so `exit` stands in for it.
const appPlatform: ShellPlatform = {
  onBackButton: async (handler) =>
    toUnsubscribe(await App.addListener("backButton", () => handler())),
  exit: () => App.exitApp(),
};

export const createCapacitorShellDeps = (): ShellDeps => ({
  acquireSurface: async () => {
    const { surfaceId } = await EmbeddedBrowser.create();
    return createEmbeddedSurface(surfaceId);
  },
  launcher: mediaPickerLauncher,
  permissions: runtimePermissionGateway,
  platform: appPlatform,
});
