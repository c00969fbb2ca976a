import type { RctEntity } from "@/entity/entity";

export const TopicType = {
  STATE: "state",
  ATTRIBUTES: "attributes",
  AVAILABILITY: "availability",
} as const;
type TopicType = (typeof TopicType)[keyof typeof TopicType];

export function getTopic(entity: RctEntity, type: TopicType): string {
  return `rct2mqtt/${entity.uniqueId}/${type}`;
}

export function getDiscoveryTopic(prefix: string, entity: RctEntity): string {
  return `${prefix}/sensor/${entity.uniqueId}/config`;
}
