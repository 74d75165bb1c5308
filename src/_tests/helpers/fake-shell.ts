import { vi } from "vitest";
import type {
  ActivityResult,
  BrowserSurface,
  ChromeClient,
  FileChooserParams,
  FileSelection,
  NavigationClient,
  PermissionGateway,
  PickerIntent,
  PickerLauncher,
  RuntimePermission,
  RuntimePermissionStatus,
  ShellDeps,
  ShellPlatform,
  SurfaceSettings,
} from "@/lib/definitions";

/**
 * In-memory web view. `calls` records every port call in order.
 */
export class FakeSurface implements BrowserSurface {
  readonly calls: string[] = [];
  readonly history: string[] = [];
  settings: SurfaceSettings | null = null;
  chromeClient: ChromeClient | null = null;
  navigationClient: NavigationClient | null = null;
  destroyed = false;

  async configure(settings: SurfaceSettings) {
    this.calls.push("configure");
    this.settings = settings;
  }

  async setChromeClient(client: ChromeClient) {
    this.calls.push("setChromeClient");
    this.chromeClient = client;
  }

  async setNavigationClient(client: NavigationClient) {
    this.calls.push("setNavigationClient");
    this.navigationClient = client;
  }

  async loadUrl(url: string) {
    this.calls.push(`loadUrl ${url}`);
    this.history.push(url);
  }

  async canGoBack() {
    return this.history.length > 1;
  }

  async goBack() {
    this.calls.push("goBack");
    this.history.pop();
  }

  async destroy() {
    this.calls.push("destroy");
    this.destroyed = true;
  }

  /**
   * Simulate a file input on the page. Every selection handed back is
   * collected in `selections`.
   */
  requestFileChooser(
    params: FileChooserParams = { acceptTypes: ["image/*"], allowMultiple: false }
  ) {
    const client = this.chromeClient;
    if (!client) throw new Error("No chrome client installed");

    const selections: FileSelection[] = [];
    const shown = client.onShowFileChooser(
      (selection) => selections.push(selection),
      params
    );
    return { selections, shown };
  }
}

export class FakeLauncher implements PickerLauncher {
  readonly launches: { intent: PickerIntent; requestCode: number }[] = [];
  failNextLaunch = false;
  private handler: ((result: ActivityResult) => void) | null = null;
  readonly unsubscribe = vi.fn(async () => {
    this.handler = null;
  });

  async launch(intent: PickerIntent, requestCode: number) {
    if (this.failNextLaunch) {
      this.failNextLaunch = false;
      throw new Error("No activity found to handle intent");
    }
    this.launches.push({ intent, requestCode });
  }

  async onResult(handler: (result: ActivityResult) => void) {
    this.handler = handler;
    return this.unsubscribe;
  }

  deliver(result: ActivityResult) {
    if (!this.handler) throw new Error("No result handler subscribed");
    this.handler(result);
  }
}

export class FakePermissions implements PermissionGateway {
  readonly requests: RuntimePermission[][] = [];
  status: RuntimePermissionStatus = {
    readExternalStorage: "prompt",
    writeExternalStorage: "prompt",
    camera: "prompt",
  };

  async checkPermissions() {
    return { ...this.status };
  }

  async requestPermissions(permissions: RuntimePermission[]) {
    this.requests.push(permissions);
  }
}

export class FakePlatform implements ShellPlatform {
  exits = 0;
  private handler: (() => void) | null = null;
  readonly unsubscribe = vi.fn(async () => {
    this.handler = null;
  });

  async onBackButton(handler: () => void) {
    this.handler = handler;
    return this.unsubscribe;
  }

  async exit() {
    this.exits += 1;
  }

  pressBack() {
    if (!this.handler) throw new Error("No back handler subscribed");
    this.handler();
  }
}

export function createFakeShellDeps() {
  const surface = new FakeSurface();
  const launcher = new FakeLauncher();
  const permissions = new FakePermissions();
  const platform = new FakePlatform();

  const deps: ShellDeps = {
    acquireSurface: vi.fn(async () => surface),
    launcher,
    permissions,
    platform,
  };

  return { deps, surface, launcher, permissions, platform };
}

export const flushPromises = () =>
  new Promise<void>((resolve) => setTimeout(resolve, 0));
