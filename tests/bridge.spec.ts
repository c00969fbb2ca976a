import assert from "assert";
import { startBridge } from "@/bridge";
import type { RegisterClient } from "@/coordinator/updateCoordinator";
import { createEntityDescription } from "@/entity/description";
import logger from "@/logger";
import setupMqttDeviceManager from "@/manager/mqttDeviceManager";
import initializeHttpServer from "@/service/http";
import type { MqttClient } from "@/service/mqtt";
import { testRegistry, valid } from "./testUtil";

vi.mock("@/manager/mqttDeviceManager", () => ({
  default: vi.fn(),
}));

vi.mock("@/service/http", () => ({
  default: vi.fn(),
}));

describe("startBridge", () => {
  const mockMqttClient: MqttClient = {
    publish: vi.fn(),
    taskQueueSize: 0,
    close: vi.fn(),
  };
  const mockStopAutoPublish = vi.fn();
  const mockHttpClose = vi.fn();
  const mockReadObjects = vi.fn<RegisterClient["readObjects"]>();
  const client: RegisterClient = { readObjects: mockReadObjects };

  const descriptions = [
    createEntityDescription(testRegistry, { key: "battery.soc" }),
    createEntityDescription(testRegistry, {
      key: "energy.e_ac_day",
      updatePriority: "INFREQUENT",
      meteredReset: "DAILY",
    }),
  ];

  beforeEach(() => {
    vi.resetAllMocks();

    mockReadObjects.mockImplementation((objectIds) =>
      Promise.resolve(
        objectIds.map((objectId) =>
          valid(objectId, objectId === 0x2001 ? 0.5 : 1234),
        ),
      ),
    );
    vi.mocked(setupMqttDeviceManager).mockResolvedValue({
      mqtt: mockMqttClient,
      stopAutoPublish: mockStopAutoPublish,
    });
    vi.mocked(initializeHttpServer).mockResolvedValue({
      port: 3000,
      close: mockHttpClose,
    });
  });

  test("更新頻度ごとにコーディネーターを作成しエンティティに値を供給する", async () => {
    const { entities, coordinators, shutdown } = await startBridge({
      client,
      registry: testRegistry,
      descriptions,
    });

    expect(coordinators.map(({ priority }) => priority)).toEqual([
      "FREQUENT",
      "INFREQUENT",
    ]);
    expect(mockReadObjects).toHaveBeenCalledWith([0x2001]);
    expect(mockReadObjects).toHaveBeenCalledWith([0x2003]);

    expect(entities.map(({ uniqueId }) => uniqueId)).toEqual([
      "rct_power-8193",
      "rct_power-8195",
    ]);
    expect(entities[0].name).toBe("RCT Power battery_soc");
    await vi.waitFor(() => {
      expect(entities[0].state).toBe(50);
      expect(entities[1].state).toBe(1234);
    });

    await shutdown();
  });

  test("起動時に利用可否を送信する", async () => {
    const { shutdown } = await startBridge({
      client,
      registry: testRegistry,
      descriptions,
    });

    expect(mockMqttClient.publish).toHaveBeenCalledWith(
      "rct2mqtt/rct_power-8193/availability",
      expect.stringMatching(/^(online|offline)$/),
    );

    await shutdown();
  });

  test("shutdownで全ての処理が停止する", async () => {
    const { shutdown } = await startBridge({
      client,
      registry: testRegistry,
      descriptions,
    });

    await shutdown();

    expect(mockStopAutoPublish).toHaveBeenCalledTimes(1);
    expect(mockMqttClient.close).toHaveBeenCalledExactlyOnceWith(true);
    expect(mockHttpClose).toHaveBeenCalledTimes(1);
    expect(mockMqttClient.publish).toHaveBeenCalledWith(
      "rct2mqtt/rct_power-8195/availability",
      "offline",
    );
  });

  test("ヘルスチェックにコーディネーターの状態を渡す", async () => {
    const { shutdown } = await startBridge({
      client,
      registry: testRegistry,
      descriptions,
    });

    const [getCoordinatorStatuses] = vi.mocked(initializeHttpServer).mock
      .calls[0];
    assert(getCoordinatorStatuses);
    expect(getCoordinatorStatuses()).toMatchObject([
      { priority: "FREQUENT", objectCount: 1 },
      { priority: "INFREQUENT", objectCount: 1 },
    ]);

    await shutdown();
  });

  test("起動処理に失敗した場合、エラーをログに出力して例外をスローする", async () => {
    const logErrorSpy = vi.spyOn(logger, "error");
    const error = new Error("connection refused");
    vi.mocked(setupMqttDeviceManager).mockRejectedValue(error);

    await expect(
      startBridge({ client, registry: testRegistry, descriptions }),
    ).rejects.toThrow(error);

    expect(logErrorSpy).toHaveBeenCalledWith("startBridge() error:", error);
    expect(initializeHttpServer).not.toHaveBeenCalled();
  });

  test("ヘルスチェックの起動に失敗した場合、MQTTの送信を停止して切断する", async () => {
    const error = new Error("listen EADDRINUSE");
    vi.mocked(initializeHttpServer).mockRejectedValue(error);

    await expect(
      startBridge({ client, registry: testRegistry, descriptions }),
    ).rejects.toThrow(error);

    expect(mockStopAutoPublish).toHaveBeenCalledTimes(1);
    expect(mockMqttClient.close).toHaveBeenCalledTimes(1);
    expect(mockMqttClient.publish).not.toHaveBeenCalled();
  });

  test("MQTTの接続に失敗した場合はMQTTの停止処理を行わない", async () => {
    vi.mocked(setupMqttDeviceManager).mockRejectedValue(
      new Error("connection refused"),
    );

    await expect(
      startBridge({ client, registry: testRegistry, descriptions }),
    ).rejects.toThrow("connection refused");

    expect(mockStopAutoPublish).not.toHaveBeenCalled();
    expect(mockMqttClient.close).not.toHaveBeenCalled();
  });
});
