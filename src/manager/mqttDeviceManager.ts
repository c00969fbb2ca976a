import type { RctEntity } from "@/entity/entity";
import env from "@/env";
import logger from "@/logger";
import {
  buildDevice,
  buildEntity,
  buildOrigin,
  buildState,
} from "@/payload/builder";
import { getDiscoveryTopic, getTopic, TopicType } from "@/payload/topic";
import initializeMqttClient from "@/service/mqtt";
import { setTimeout } from "timers/promises";

export default async function setupMqttDeviceManager(entities: RctEntity[]) {
  const origin = buildOrigin();
  const mqtt = await initializeMqttClient();
  const publishedDiscoveryMessages = new Map<string, string>();

  // Home Assistantでデバイスを検出
  // デバイス情報はレジスタから得るため、内容が変わったら送り直す
  const publishDiscovery = (entity: RctEntity) => {
    const { deviceInfo } = entity;
    const discoveryMessage = JSON.stringify({
      ...buildEntity(entity),
      ...(deviceInfo ? buildDevice(deviceInfo) : {}),
      ...origin,
    });
    if (publishedDiscoveryMessages.get(entity.uniqueId) === discoveryMessage) {
      return;
    }
    publishedDiscoveryMessages.set(entity.uniqueId, discoveryMessage);
    mqtt.publish(
      getDiscoveryTopic(env.HA_DISCOVERY_PREFIX, entity),
      discoveryMessage,
      { qos: 1, retain: true },
    );
  };

  const publishEntity = (entity: RctEntity) => {
    // 一度も値を受信していないエンティティは登録を保留する
    if (!entity.available && !publishedDiscoveryMessages.has(entity.uniqueId)) {
      return;
    }
    publishDiscovery(entity);
    mqtt.publish(
      getTopic(entity, TopicType.STATE),
      JSON.stringify(buildState(entity)),
      { retain: true },
    );
    mqtt.publish(
      getTopic(entity, TopicType.ATTRIBUTES),
      JSON.stringify(entity.extraStateAttributes),
      { retain: true },
    );
  };

  // 定期的にエンティティの状態を更新
  let isAutoPublishRunning = true;
  const autoPublishTask = (async () => {
    while (isAutoPublishRunning) {
      for (const entity of entities) {
        try {
          publishEntity(entity);
        } catch (err) {
          logger.error(`Failed to publish entity: ${entity.uniqueId}`, err);
        }
      }
      await setTimeout(env.STATE_PUBLISH_INTERVAL);
    }
  })();

  const stopAutoPublish = async () => {
    isAutoPublishRunning = false;
    await autoPublishTask;
  };

  return { mqtt, stopAutoPublish };
}
