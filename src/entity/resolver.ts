import type { ApiResponse, RawValue } from "@/api/apiResponse";
import { getValidResponseValueOr, isValidApiResponse } from "@/api/apiResponse";
import type { Coordinator } from "@/coordinator/updateCoordinator";
import type { EntityDescription } from "@/entity/description";
import type { DeviceClass } from "@/entity/deviceClass";
import { resolveDeviceClass } from "@/entity/deviceClass";
import type { ObjectRegistry } from "@/registry/objectRegistry";

export type EntityResolver = {
  readonly objectNames: readonly string[];
  readonly objectIds: readonly number[];
  readonly available: boolean;
  readonly unit: string | undefined;
  readonly deviceClass: DeviceClass | undefined;
  resolve: (objectId: number) => ApiResponse | undefined;
  resolveByName: (objectName: string) => ApiResponse | undefined;
  resolveValue: <T>(objectId: number, defaultValue: T) => RawValue | T;
  resolveValueByName: <T>(objectName: string, defaultValue: T) => RawValue | T;
};

/**
 * エンティティが参照するレジスタの値をコーディネーターのキャッシュから解決します。
 *
 * @param coordinators 鮮度の高いものから順に並べたコーディネーター
 */
export function createEntityResolver(
  description: EntityDescription,
  coordinators: readonly Coordinator[],
  registry: ObjectRegistry,
): EntityResolver {
  const objectIds = Object.freeze(
    description.objectInfos.map(({ objectId }) => objectId),
  );

  const resolve = (objectId: number): ApiResponse | undefined => {
    for (const coordinator of coordinators) {
      const latestResponse = coordinator.getLatestResponse(objectId);
      if (latestResponse !== undefined) {
        return latestResponse;
      }
    }
    return undefined;
  };

  const resolveByName = (objectName: string) =>
    resolve(registry.getByName(objectName).objectId);

  const unit = () =>
    description.unitOfMeasurement ?? description.objectInfos[0]?.unit;

  return {
    objectNames: description.objectNames,
    objectIds,
    get available() {
      return objectIds.every((objectId) =>
        isValidApiResponse(resolve(objectId)),
      );
    },
    get unit() {
      return unit();
    },
    get deviceClass() {
      return resolveDeviceClass(description.deviceClass, unit());
    },
    resolve,
    resolveByName,
    resolveValue: (objectId, defaultValue) =>
      getValidResponseValueOr(resolve(objectId), defaultValue),
    resolveValueByName: (objectName, defaultValue) =>
      getValidResponseValueOr(resolveByName(objectName), defaultValue),
  };
}
