import type { ApiResponse } from "@/api/apiResponse";
import type { EntityUpdatePriority } from "@/const";
import { EntityUpdatePriorities } from "@/const";
import logger from "@/logger";
import { setTimeout } from "timers/promises";

/**
 * レジスタプロトコルのクライアント
 */
export interface RegisterClient {
  /**
   * 指定したオブジェクトを読み出します。
   *
   * 応答のなかったオブジェクトは結果に含めなくてもよい。
   *
   * @param objectIds 読み出すオブジェクトID
   */
  readObjects(objectIds: readonly number[]): Promise<ApiResponse[]>;
}

export interface Coordinator {
  readonly priority: EntityUpdatePriority;

  /**
   * 最後に受信した応答を返します。I/Oは行いません。
   */
  getLatestResponse(objectId: number): ApiResponse | undefined;
}

export type UpdateCoordinator = Coordinator & {
  readonly objectIds: readonly number[];
  readonly lastUpdated: Date | undefined;
  refresh: () => Promise<void>;
  start: () => void;
  stop: () => Promise<void>;
};

export function createUpdateCoordinator({
  priority,
  client,
  objectIds,
  interval,
}: {
  priority: EntityUpdatePriority;
  client: RegisterClient;
  objectIds: readonly number[];
  interval: number;
}): UpdateCoordinator {
  const log = logger.child({ label: `Coordinator ${priority}` });
  const latestResponses = new Map<number, ApiResponse>();
  let lastUpdated: Date | undefined;
  let task: Promise<void> | undefined;
  let controller: AbortController | undefined;

  const refresh = async () => {
    const responses = await client.readObjects(objectIds);
    for (const response of responses) {
      latestResponses.set(response.objectId, response);
    }
    lastUpdated = new Date();
    log.debug(`received ${responses.length}/${objectIds.length} responses`);
  };

  const run = async (signal: AbortSignal) => {
    while (!signal.aborted) {
      try {
        await refresh();
      } catch (err) {
        log.error("Failed to read objects", err);
      }

      try {
        await setTimeout(interval, undefined, { signal });
      } catch (err) {
        if (!signal.aborted) {
          throw err;
        }
      }
    }
  };

  const start = () => {
    if (task) {
      return;
    }
    log.info(`start polling ${objectIds.length} objects every ${interval}ms`);
    const currentController = new AbortController();
    controller = currentController;
    task = run(currentController.signal);
  };

  const stop = async () => {
    controller?.abort();
    await task;
    task = undefined;
    controller = undefined;
    log.info("stopped");
  };

  return {
    priority,
    objectIds,
    get lastUpdated() {
      return lastUpdated;
    },
    getLatestResponse: (objectId) => latestResponses.get(objectId),
    refresh,
    start,
    stop,
  };
}

/**
 * 指定した更新頻度のコーディネーターを先頭に、残りを優先度順に並べます
 */
export function orderCoordinators<T extends Coordinator>(
  priority: EntityUpdatePriority,
  coordinators: readonly T[],
): T[] {
  const rank = (coordinator: T) =>
    coordinator.priority === priority
      ? -1
      : EntityUpdatePriorities.indexOf(coordinator.priority);

  return [...coordinators].sort((a, b) => rank(a) - rank(b));
}

/**
 * 更新頻度ごとにコーディネーターを作成します
 */
export function setupUpdateCoordinators(
  client: RegisterClient,
  descriptions: readonly {
    updatePriority: EntityUpdatePriority;
    objectInfos: readonly { objectId: number }[];
  }[],
  intervals: Readonly<Record<EntityUpdatePriority, number>>,
): UpdateCoordinator[] {
  return EntityUpdatePriorities.flatMap((priority) => {
    const objectIds = [
      ...new Set(
        descriptions
          .filter((description) => description.updatePriority === priority)
          .flatMap((description) =>
            description.objectInfos.map(({ objectId }) => objectId),
          ),
      ),
    ];
    if (objectIds.length === 0) {
      return [];
    }

    return [
      createUpdateCoordinator({
        priority,
        client,
        objectIds,
        interval: intervals[priority],
      }),
    ];
  });
}
