import { MeteredResetFrequency } from "@/const";
import type { DeviceIdentity } from "@/entity/device";
import type { RctEntity } from "@/entity/entity";
import env from "@/env";
import { getTopic, TopicType } from "@/payload/topic";
import type { JsonObject } from "type-fest";
import { name as packageName, version as packageVersion } from "~/package.json";

export type Payload = JsonObject;

export function buildEntity(
  entity: RctEntity,
): Readonly<Payload & { unique_id: string }> {
  const baseMessage = {
    unique_id: entity.uniqueId,
    name: entity.name,
    icon: entity.icon,
    state_topic: getTopic(entity, TopicType.STATE),
    value_template: "{{ value_json.state }}",
    json_attributes_topic: getTopic(entity, TopicType.ATTRIBUTES),
    availability_topic: getTopic(entity, TopicType.AVAILABILITY),
    qos: env.ENTITY_QOS,
  };

  const optionMessage: Payload = {};
  const { deviceClass, unitOfMeasurement } = entity;
  if (deviceClass) {
    optionMessage.device_class = deviceClass;
  }
  if (unitOfMeasurement) {
    optionMessage.unit_of_measurement = unitOfMeasurement;
  }
  if (entity.description.stateClass) {
    optionMessage.state_class = entity.description.stateClass;
  }
  if (entity.description.meteredReset !== MeteredResetFrequency.NEVER) {
    optionMessage.last_reset_value_template = "{{ value_json.last_reset }}";
  }

  return { ...baseMessage, ...optionMessage } as const;
}

export function buildDevice(identity: DeviceIdentity): Readonly<Payload> {
  const device: Payload = {
    identifiers: identity.identifiers.map((identifier) => identifier.join("_")),
    name: identity.name,
    sw_version: identity.swVersion,
    model: identity.model,
    manufacturer: identity.manufacturer,
  };
  if (identity.viaDevice) {
    device.via_device = identity.viaDevice.join("_");
  }

  return { device };
}

export function buildOrigin(): Readonly<Payload> {
  const origin: Payload = {};
  if (typeof packageName === "string") origin.name = packageName;
  if (typeof packageVersion === "string") origin.sw_version = packageVersion;
  return { origin };
}

export function buildState(entity: RctEntity): Readonly<Payload> {
  const state: Payload = { state: entity.state };
  const { lastReset } = entity;
  if (lastReset) {
    state.last_reset = lastReset.toISOString();
  }

  return state;
}
