import type { PermissionGateway, RuntimePermission } from "./definitions";

/**
 * Issue one combined request for `permissions` when any of them is not
 * granted yet. The grant outcome is not inspected.
 *
 * @returns the permissions that were missing before the request
 */
export async function requestMissingPermissions(
  gateway: PermissionGateway,
  permissions: readonly RuntimePermission[]
): Promise<RuntimePermission[]> {
  const status = await gateway.checkPermissions();
  const missing = permissions.filter(
    (permission) => status[permission] !== "granted"
  );
  if (missing.length === 0) return missing;

  console.log(`[Permissions] Requesting, missing: ${missing.join(", ")}`);
  await gateway.requestPermissions([...permissions]);
  return missing;
}
