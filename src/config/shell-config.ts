import type { RuntimePermission, SurfaceSettings } from "@/lib/definitions";

export interface FileChooserConfig {
  mimeType: string;
  requestCode: number;
}

export interface ShellConfig {
  remoteUrl: string;
  permissions: readonly RuntimePermission[];
  surfaceSettings: SurfaceSettings;
  fileChooser: FileChooserConfig;
}

export const DEFAULT_REMOTE_URL = "https://your-panel-name.up.railway.app";

export const REQUEST_SELECT_FILE = 100;

export const DEFAULT_SHELL_CONFIG: ShellConfig = {
  remoteUrl: DEFAULT_REMOTE_URL,
  permissions: ["readExternalStorage", "writeExternalStorage", "camera"],
  surfaceSettings: {
    javaScriptEnabled: true,
    allowFileAccess: true,
    allowContentAccess: true,
    allowFileAccessFromFileURLs: true,
    allowUniversalAccessFromFileURLs: true,
    domStorageEnabled: true,
    databaseEnabled: true,
  },
  fileChooser: {
    mimeType: "image/*",
    requestCode: REQUEST_SELECT_FILE,
  },
};

type ShellEnv = Pick<ImportMetaEnv, "VITE_REMOTE_URL">;

export function parseRemoteUrl(value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new Error(`Invalid remote URL: ${value}`);
  }
  if (url.protocol !== "https:") {
    throw new Error(`Remote URL must use https: ${value}`);
  }
  return url.href;
}

/**
 * Build the shell configuration for this deployment target.
 * `VITE_REMOTE_URL` replaces the compiled-in panel address.
 */
export function resolveShellConfig(
  env: ShellEnv = import.meta.env
): ShellConfig {
  const override = env.VITE_REMOTE_URL?.trim();
  if (!override) return DEFAULT_SHELL_CONFIG;

  return {
    ...DEFAULT_SHELL_CONFIG,
    remoteUrl: parseRemoteUrl(override),
  };
}
