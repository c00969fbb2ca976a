import { EntityUpdatePriority } from "@/const";
import type {
  RegisterClient,
  UpdateCoordinator,
} from "@/coordinator/updateCoordinator";
import {
  orderCoordinators,
  setupUpdateCoordinators,
} from "@/coordinator/updateCoordinator";
import { createEntityDescriptions } from "@/entity/definitions";
import type { EntityDescription } from "@/entity/description";
import type { RctEntity } from "@/entity/entity";
import { createEntity } from "@/entity/entity";
import env from "@/env";
import logger from "@/logger";
import { setupAvailability } from "@/manager/availabilityManager";
import setupMqttDeviceManager from "@/manager/mqttDeviceManager";
import type { ObjectRegistry } from "@/registry/objectRegistry";
import { loadDefaultObjectRegistry } from "@/registry/objectRegistry";
import initializeHttpServer from "@/service/http";

export type BridgeOptions = {
  client: RegisterClient;
  registry?: ObjectRegistry;
  descriptions?: EntityDescription[];
};

export type Bridge = {
  entities: RctEntity[];
  coordinators: UpdateCoordinator[];
  shutdown: () => Promise<void>;
};

export async function startBridge({
  client,
  registry = loadDefaultObjectRegistry(),
  descriptions,
}: BridgeOptions): Promise<Bridge> {
  logger.info("start");

  const configEntry = {
    entryId: env.ENTRY_ID,
    entityPrefix: env.ENTITY_PREFIX,
  };
  const entityDescriptions = descriptions ?? createEntityDescriptions(registry);
  const coordinators = setupUpdateCoordinators(client, entityDescriptions, {
    [EntityUpdatePriority.FREQUENT]: env.FREQUENT_SCAN_INTERVAL,
    [EntityUpdatePriority.INFREQUENT]: env.INFREQUENT_SCAN_INTERVAL,
    [EntityUpdatePriority.STATIC]: env.STATIC_SCAN_INTERVAL,
  });
  const entities = entityDescriptions.map((description) =>
    createEntity(
      description,
      orderCoordinators(description.updatePriority, coordinators),
      configEntry,
      registry,
    ),
  );

  coordinators.forEach((coordinator) => coordinator.start());
  const stopCoordinators = async () => {
    await Promise.all(coordinators.map((coordinator) => coordinator.stop()));
  };

  let deviceManager:
    | Awaited<ReturnType<typeof setupMqttDeviceManager>>
    | undefined;

  try {
    deviceManager = await setupMqttDeviceManager(entities);
    const { mqtt, stopAutoPublish } = deviceManager;
    const http = await initializeHttpServer(() =>
      coordinators.map(({ priority, objectIds, lastUpdated }) => ({
        priority,
        objectCount: objectIds.length,
        lastUpdated: lastUpdated?.toISOString() ?? null,
      })),
    );
    const availability = setupAvailability(entities, mqtt);

    const shutdown = async () => {
      logger.info("shutdown start");
      await stopAutoPublish();
      await stopCoordinators();
      availability.close();
      await mqtt.close(true);
      await http.close();
      logger.info("shutdown finished");
    };

    availability.pushAvailability();

    logger.info(`ready: ${entities.length} entities`);

    return { entities, coordinators, shutdown };
  } catch (err) {
    logger.error("startBridge() error:", err);
    await deviceManager?.stopAutoPublish();
    await stopCoordinators();
    await deviceManager?.mqtt.close();
    throw err;
  }
}
