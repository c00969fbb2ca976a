import { EntityUpdatePriority, ICON, MeteredResetFrequency } from "@/const";
import type { DeviceClass, StateClass } from "@/entity/deviceClass";
import type {
  ObjectDescriptor,
  ObjectRegistry,
} from "@/registry/objectRegistry";

export type EntityKind = "sensor" | "fault" | "attributes";
export type DeviceKind = "inverter" | "battery";

export const FAULT_BITMASK_COUNT = 4;

export type EntityDescription = {
  readonly key: string;
  readonly name?: string;
  readonly icon: string;
  readonly objectNames: readonly string[];
  readonly objectInfos: readonly ObjectDescriptor[];
  readonly updatePriority: EntityUpdatePriority;
  readonly meteredReset: MeteredResetFrequency;
  readonly unitOfMeasurement?: string;
  readonly deviceClass?: DeviceClass;
  readonly stateClass?: StateClass;
  readonly kind: EntityKind;
  readonly device?: DeviceKind;
};

export type EntityDescriptionOptions = {
  key: string;
  name?: string;
  icon?: string;
  objectNames?: readonly string[];
  updatePriority?: EntityUpdatePriority;
  meteredReset?: MeteredResetFrequency;
  unitOfMeasurement?: string;
  deviceClass?: DeviceClass;
  stateClass?: StateClass;
  kind?: EntityKind;
  device?: DeviceKind;
};

/**
 * エンティティ定義を作成します。参照するオブジェクトはこの時点でレジストリから解決する。
 *
 * @throws {NameResolutionError} レジストリに存在しないオブジェクト名を指定した場合
 */
export function createEntityDescription(
  registry: ObjectRegistry,
  {
    key,
    name,
    icon = ICON,
    objectNames = [],
    updatePriority = EntityUpdatePriority.FREQUENT,
    meteredReset = MeteredResetFrequency.NEVER,
    unitOfMeasurement,
    deviceClass,
    stateClass,
    kind = "sensor",
    device,
  }: EntityDescriptionOptions,
): EntityDescription {
  const names = objectNames.length > 0 ? [...objectNames] : [key];
  const objectInfos = names.map((objectName) =>
    registry.getByName(objectName),
  );

  if (kind === "fault" && objectInfos.length !== FAULT_BITMASK_COUNT) {
    throw new Error(
      `Fault entity "${key}" must track ${FAULT_BITMASK_COUNT} objects, got ${objectInfos.length}`,
    );
  }
  if (kind === "attributes" && meteredReset !== MeteredResetFrequency.NEVER) {
    throw new Error(`Attributes entity "${key}" cannot have a metered reset`);
  }

  return Object.freeze({
    key,
    name,
    icon,
    objectNames: Object.freeze(names),
    objectInfos: Object.freeze(objectInfos),
    updatePriority,
    meteredReset,
    unitOfMeasurement,
    deviceClass,
    stateClass,
    kind,
    device,
  });
}
