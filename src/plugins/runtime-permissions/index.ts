import { registerPlugin } from "@capacitor/core";
import type {
  RuntimePermission,
  RuntimePermissionStatus,
} from "@/lib/definitions";

export interface RuntimePermissionsPlugin {
  checkPermissions(): Promise<RuntimePermissionStatus>;

  /**
   * Shows a single system dialog for every alias passed.
   */
  requestPermissions(options: {
    permissions: RuntimePermission[];
  }): Promise<RuntimePermissionStatus>;
}

export const RuntimePermissions =
  registerPlugin<RuntimePermissionsPlugin>("RuntimePermissions");
