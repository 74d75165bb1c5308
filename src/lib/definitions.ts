import type { PermissionState } from "@capacitor/core";

export type RuntimePermission =
  | "readExternalStorage"
  | "writeExternalStorage"
  | "camera";

export type RuntimePermissionStatus = Record<RuntimePermission, PermissionState>;

export interface SurfaceSettings {
  javaScriptEnabled: boolean;
  allowFileAccess: boolean;
  allowContentAccess: boolean;
  allowFileAccessFromFileURLs: boolean;
  allowUniversalAccessFromFileURLs: boolean;
  domStorageEnabled: boolean;
  databaseEnabled: boolean;
}

/**
 * What the page receives for a file input:
 * - `string[]` with the selected content URIs (`[]` when the picker returned
 *   a payload without a usable reference)
 * - `null` when nothing was selected
 */
export type FileSelection = string[] | null;

export type FileChooserCallback = (selection: FileSelection) => void;

export interface FileChooserParams {
  acceptTypes: string[];
  allowMultiple: boolean;
}

export interface PickerIntent {
  mimeType: string;
  allowMultiple: false;
}

export type ActivityResultCode = "ok" | "canceled";

export interface ActivityResult {
  requestCode: number;
  resultCode: ActivityResultCode;
  // Absent when the picker returned no payload at all
  data?: { dataString: string | null } | null;
}

export interface ChromeClient {
  onShowFileChooser(
    callback: FileChooserCallback,
    params: FileChooserParams
  ): Promise<boolean>;
}

export interface NavigationClient {
  onPageFinished(url: string): void;
  shouldOverrideUrlLoading(url: string): Promise<boolean>;
}

export type Unsubscribe = () => Promise<void>;

export interface BrowserSurface {
  configure(settings: SurfaceSettings): Promise<void>;
  setChromeClient(client: ChromeClient): Promise<void>;
  setNavigationClient(client: NavigationClient): Promise<void>;
  loadUrl(url: string): Promise<void>;
  canGoBack(): Promise<boolean>;
  goBack(): Promise<void>;
  destroy(): Promise<void>;
}

export interface PickerLauncher {
  /** Rejects when the platform cannot satisfy the intent. */
  launch(intent: PickerIntent, requestCode: number): Promise<void>;
  onResult(handler: (result: ActivityResult) => void): Promise<Unsubscribe>;
}

export interface PermissionGateway {
  checkPermissions(): Promise<RuntimePermissionStatus>;
  requestPermissions(permissions: RuntimePermission[]): Promise<void>;
}

export interface ShellPlatform {
  onBackButton(handler: () => void): Promise<Unsubscribe>;
  exit(): Promise<void>;
}

export interface ShellDeps {
  acquireSurface(): Promise<BrowserSurface>;
  launcher: PickerLauncher;
  permissions: PermissionGateway;
  platform: ShellPlatform;
}

export type BackOutcome = "history" | "exited";

export type ShellPhase = "starting" | "loaded" | "failed";
