import type { RawValue } from "@/api/apiResponse";
import { toApiResponseRecord, toJsonValue } from "@/api/apiResponse";
import type { EntityDescription, EntityKind } from "@/entity/description";
import type { DeviceClass } from "@/entity/deviceClass";
import type { DisplayValue } from "@/entity/normalize";
import { normalizeValue } from "@/entity/normalize";
import type { EntityResolver } from "@/entity/resolver";
import type { JsonObject } from "type-fest";

export type EntityBehavior = {
  computeState: (resolver: EntityResolver) => DisplayValue;
  computeAttributes: (resolver: EntityResolver) => JsonObject;
  computeUnit: (resolver: EntityResolver) => string | undefined;
  computeDeviceClass: (
    resolver: EntityResolver,
    description: EntityDescription,
  ) => DeviceClass | undefined;
  hasLastReset: boolean;
};

export function computeBaseAttributes(resolver: EntityResolver): JsonObject {
  return {
    latest_api_responses: resolver.objectIds.flatMap((objectId) => {
      const response = resolver.resolve(objectId);
      return response ? [toApiResponseRecord(response)] : [];
    }),
  };
}

const sensorBehavior: EntityBehavior = {
  computeState: (resolver) =>
    normalizeValue(
      resolver.resolveValue(resolver.objectIds[0], null),
      resolver.unit,
    ),
  computeAttributes: computeBaseAttributes,
  computeUnit: (resolver) => resolver.unit,
  computeDeviceClass: (resolver) => resolver.deviceClass,
  hasLastReset: true,
};

function isInteger(value: RawValue | null): value is number {
  return typeof value === "number" && Number.isInteger(value);
}

export function getFaultBitmasks(resolver: EntityResolver): (number | null)[] {
  return resolver.objectIds.map((objectId) => {
    const value = resolver.resolveValue(objectId, null);
    return isInteger(value) ? value : null;
  });
}

const faultBehavior: EntityBehavior = {
  computeState: (resolver) => {
    const bitmasks = getFaultBitmasks(resolver);
    if (!bitmasks.every((bitmask): bitmask is number => bitmask !== null)) {
      return null;
    }
    // 桁数は揃えない
    return bitmasks.map((bitmask) => bitmask.toString(2)).join("");
  },
  computeAttributes: (resolver) => ({
    ...computeBaseAttributes(resolver),
    fault_bitmasks: getFaultBitmasks(resolver),
  }),
  computeUnit: () => undefined,
  // 単位を持たないため明示的な指定のみ
  computeDeviceClass: (_resolver, description) => description.deviceClass,
  hasLastReset: true,
};

const attributesBehavior: EntityBehavior = {
  computeState: (resolver) =>
    `${Object.keys(attributesBehavior.computeAttributes(resolver)).length} attributes`,
  computeAttributes: (resolver) => {
    const attributes: JsonObject = { ...computeBaseAttributes(resolver) };
    for (const objectName of resolver.objectNames) {
      const value = resolver.resolveValueByName(objectName, null);
      attributes[objectName] = value === null ? null : toJsonValue(value);
    }
    return attributes;
  },
  computeUnit: () => undefined,
  computeDeviceClass: (_resolver, description) => description.deviceClass,
  hasLastReset: false,
};

export const EntityBehaviors: Readonly<Record<EntityKind, EntityBehavior>> = {
  sensor: sensorBehavior,
  fault: faultBehavior,
  attributes: attributesBehavior,
};
