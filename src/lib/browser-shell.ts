import type { ShellConfig } from "@/config/shell-config";
import type {
  ActivityResult,
  BackOutcome,
  BrowserSurface,
  ChromeClient,
  FileChooserCallback,
  FileChooserParams,
  NavigationClient,
  ShellDeps,
  Unsubscribe,
} from "./definitions";
import { FileChooserBridge } from "./file-chooser-bridge";
import { NavigationBridge } from "./navigation-bridge";
import { requestMissingPermissions } from "./permissions";

/**
 * Single-screen host for the remote panel. Each platform event has one
 * explicit handler; all of them run on the JS event loop. The shell is both
 * the chrome client and the navigation client of its surface.
 */
export class BrowserShell implements ChromeClient, NavigationClient {
  readonly fileChooser: FileChooserBridge;

  private surface: BrowserSurface | null = null;
  private navigation: NavigationBridge | null = null;
  private subscriptions: Unsubscribe[] = [];
  private created = false;
  private disposed = false;

  constructor(
    private readonly config: ShellConfig,
    private readonly deps: ShellDeps
  ) {
    this.fileChooser = new FileChooserBridge(deps.launcher, config.fileChooser);
  }

  async onCreate(): Promise<void> {
    if (this.created) throw new Error("BrowserShell.onCreate called twice");
    this.created = true;

    const surface = await this.deps.acquireSurface();
    if (this.disposed) {
      await surface.destroy();
      return;
    }
    this.surface = surface;
    this.navigation = new NavigationBridge(surface);

    const steps: (() => Promise<void>)[] = [
      () => surface.configure(this.config.surfaceSettings),
      () => surface.setChromeClient(this),
      () => surface.setNavigationClient(this),
      async () => {
        this.subscriptions.push(
          await this.deps.launcher.onResult((result) =>
            this.onActivityResult(result)
          )
        );
      },
      async () => {
        this.subscriptions.push(
          await this.deps.platform.onBackButton(() => {
            this.onBackPressed().catch((error) =>
              console.error("[BrowserShell] Back navigation failed:", error)
            );
          })
        );
      },
    ];

    for (const step of steps) {
      await step();
      // dispose() may have run during the step; it already destroyed the surface
      if (this.disposed) {
        await this.releaseSubscriptions();
        return;
      }
    }

    requestMissingPermissions(this.deps.permissions, this.config.permissions)
      .then((missing) => {
        if (missing.length === 0) {
          console.log("[BrowserShell] All permissions already granted");
        }
      })
      .catch((error) =>
        console.warn("[BrowserShell] Permission request failed:", error)
      );

    console.log(`[BrowserShell] Loading ${this.config.remoteUrl}`);
    await surface.loadUrl(this.config.remoteUrl);
  }

  onShowFileChooser(
    callback: FileChooserCallback,
    params: FileChooserParams
  ): Promise<boolean> {
    return this.fileChooser.onShowFileChooser(callback, params);
  }

  onActivityResult(result: ActivityResult): void {
    this.fileChooser.onActivityResult(result);
  }

  onPageFinished(url: string): void {
    this.navigation?.onPageFinished(url);
  }

  async shouldOverrideUrlLoading(url: string): Promise<boolean> {
    if (!this.navigation) return false;
    return this.navigation.shouldOverrideUrlLoading(url);
  }

  async onBackPressed(): Promise<BackOutcome> {
    const surface = this.surface;
    if (surface && (await surface.canGoBack())) {
      await surface.goBack();
      return "history";
    }
    await this.deps.platform.exit();
    return "exited";
  }

  async dispose(): Promise<void> {
    this.disposed = true;
    await this.releaseSubscriptions();

    const surface = this.surface;
    this.surface = null;
    if (surface) await surface.destroy();
  }

  private async releaseSubscriptions(): Promise<void> {
    const subscriptions = this.subscriptions;
    this.subscriptions = [];
    await Promise.all(subscriptions.map((unsubscribe) => unsubscribe()));
  }
}
