export type {
  ApiResponse,
  InvalidApiResponse,
  RawValue,
  RawValueField,
  ValidApiResponse,
} from "@/api/apiResponse";
export { isValidApiResponse, toApiResponseRecord } from "@/api/apiResponse";
export type { Bridge, BridgeOptions } from "@/bridge";
export { startBridge } from "@/bridge";
export {
  EntityUpdatePriority,
  MeteredResetFrequency,
} from "@/const";
export type {
  Coordinator,
  RegisterClient,
  UpdateCoordinator,
} from "@/coordinator/updateCoordinator";
export {
  createUpdateCoordinator,
  orderCoordinators,
  setupUpdateCoordinators,
} from "@/coordinator/updateCoordinator";
export { createEntityDescriptions } from "@/entity/definitions";
export type {
  EntityDescription,
  EntityDescriptionOptions,
} from "@/entity/description";
export { createEntityDescription } from "@/entity/description";
export type { DeviceIdentity } from "@/entity/device";
export type { DeviceClass } from "@/entity/deviceClass";
export { guessDeviceClassFromUnit } from "@/entity/deviceClass";
export type { ConfigEntry, RctEntity } from "@/entity/entity";
export { createEntity } from "@/entity/entity";
export { describeFaults, knownFaults } from "@/entity/faults";
export { normalizeValue } from "@/entity/normalize";
export { NameResolutionError } from "@/errors";
export type {
  ObjectDescriptor,
  ObjectRegistry,
} from "@/registry/objectRegistry";
export {
  createObjectRegistry,
  loadDefaultObjectRegistry,
} from "@/registry/objectRegistry";
