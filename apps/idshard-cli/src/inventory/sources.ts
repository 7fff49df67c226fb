import type { Identifier } from "@idshard/engine";
import { InventoryRequestError } from "../errors.js";
import type { SourceType } from "../config/schema.js";
import type { InventoryClient, InventoryDevice } from "./client.js";

// Unmanaged devices cannot join a static group, so they never enter the pool.
const managedIds = (devices: readonly InventoryDevice[]) =>
  devices.filter((device) => device.managed).map((device) => device.id);

async function withContext<T>(description: string, request: Promise<T>): Promise<T> {
  try {
    return await request;
  } catch (error) {
    if (error instanceof InventoryRequestError) {
      throw new InventoryRequestError(
        `failed to retrieve ${description}: ${error.message}`,
        error.status,
        { cause: error },
      );
    }
    throw error;
  }
}

/**
 * Fetches the identifier pool for a source type. Group sources need `groupId`.
 */
export async function fetchSourceIds(
  client: InventoryClient,
  sourceType: SourceType,
  groupId: string,
): Promise<Identifier[]> {
  switch (sourceType) {
    case "computer_inventory":
      return managedIds(await withContext("computer inventory", client.listComputers()));
    case "mobile_device_inventory":
      return managedIds(await withContext("mobile devices", client.listMobileDevices()));
    case "computer_group_membership":
      return withContext(`computer group ${groupId}`, client.getComputerGroupMembers(groupId));
    case "mobile_device_group_membership":
      return withContext(
        `mobile device group ${groupId}`,
        client.getMobileDeviceGroupMembers(groupId),
      );
    case "user_accounts":
      return withContext("users", client.listUsers());
  }
}
