import type { RctEntity } from "@/entity/entity";
import env from "@/env";
import { getTopic, TopicType } from "@/payload/topic";
import type { MqttClient } from "@/service/mqtt";

export function setupAvailability(entities: RctEntity[], mqtt: MqttClient) {
  const publishAvailability = (entity: RctEntity, value: string) =>
    mqtt.publish(getTopic(entity, TopicType.AVAILABILITY), value);

  // 参照するレジスタが全て有効な場合のみオンライン
  const pushAvailability = () => {
    entities.forEach((entity) =>
      publishAvailability(entity, entity.available ? "online" : "offline"),
    );
  };

  // 状態を定期的に送信
  const availabilityTimerId = setInterval(
    pushAvailability,
    env.AVAILABILITY_INTERVAL,
  );

  const close = () => {
    clearInterval(availabilityTimerId);
    entities.forEach((entity) => publishAvailability(entity, "offline"));
  };

  return {
    pushAvailability,
    close,
  };
}
