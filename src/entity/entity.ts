import type { Coordinator } from "@/coordinator/updateCoordinator";
import { EntityBehaviors } from "@/entity/behaviors";
import type { EntityDescription } from "@/entity/description";
import type { DeviceIdentity } from "@/entity/device";
import { computeDeviceIdentity } from "@/entity/device";
import type { DeviceClass } from "@/entity/deviceClass";
import { getLastReset } from "@/entity/lastReset";
import type { DisplayValue } from "@/entity/normalize";
import type { EntityResolver } from "@/entity/resolver";
import { createEntityResolver } from "@/entity/resolver";
import type { ObjectRegistry } from "@/registry/objectRegistry";
import type { JsonObject } from "type-fest";

export type ConfigEntry = {
  readonly entryId: string;
  readonly entityPrefix: string;
};

/**
 * Home Assistant に公開するエンティティ。
 * 全ての値は参照のたびにコーディネーターのキャッシュから計算する。
 */
export interface RctEntity {
  readonly description: EntityDescription;
  readonly resolver: EntityResolver;
  readonly uniqueId: string;
  readonly name: string;
  readonly icon: string;
  readonly available: boolean;
  readonly state: DisplayValue;
  readonly unitOfMeasurement: string | undefined;
  readonly deviceClass: DeviceClass | undefined;
  readonly extraStateAttributes: JsonObject;
  readonly lastReset: Date | undefined;
  readonly deviceInfo: DeviceIdentity | undefined;
}

export function slugifyEntityName(name: string): string {
  return name.replace(/[.[\]?]/g, "_");
}

export function createEntity(
  description: EntityDescription,
  coordinators: readonly Coordinator[],
  configEntry: ConfigEntry,
  registry: ObjectRegistry,
): RctEntity {
  const resolver = createEntityResolver(description, coordinators, registry);
  const behavior = EntityBehaviors[description.kind];
  const [firstObjectInfo] = description.objectInfos;
  const entityName =
    description.name ?? slugifyEntityName(firstObjectInfo.name);

  return {
    description,
    resolver,
    uniqueId: `${configEntry.entryId}-${firstObjectInfo.objectId}`,
    name: `${configEntry.entityPrefix} ${entityName}`,
    icon: description.icon,
    get available() {
      return resolver.available;
    },
    get state() {
      return behavior.computeState(resolver);
    },
    get unitOfMeasurement() {
      return behavior.computeUnit(resolver);
    },
    get deviceClass() {
      return behavior.computeDeviceClass(resolver, description);
    },
    get extraStateAttributes() {
      return behavior.computeAttributes(resolver);
    },
    get lastReset() {
      return behavior.hasLastReset
        ? getLastReset(description.meteredReset)
        : undefined;
    },
    get deviceInfo() {
      return description.device
        ? computeDeviceIdentity(description.device, resolver)
        : undefined;
    },
  };
}
