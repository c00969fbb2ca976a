import type { Coordinator } from "@/coordinator/updateCoordinator";
import {
  computeBatteryIdentity,
  computeInverterIdentity,
  UNKNOWN_SERIAL,
} from "@/entity/device";
import { createEntityDescription } from "@/entity/description";
import { createEntity } from "@/entity/entity";
import { createEntityResolver } from "@/entity/resolver";
import {
  createStaticCoordinator,
  invalid,
  testConfigEntry,
  testRegistry,
  valid,
} from "../testUtil";

const identityResponses = () => [
  valid(0x1001, "123456"),
  valid(0x1002, "Garage"),
  valid(0x1003, "abc123"),
  valid(0x1004, "BMS-987"),
  valid(0x1005, "4.2"),
];

function setupResolver(coordinators: Coordinator[]) {
  return createEntityResolver(
    createEntityDescription(testRegistry, { key: "battery.soc" }),
    coordinators,
    testRegistry,
  );
}

describe("computeInverterIdentity", () => {
  test("シリアル番号・説明・バージョンからデバイス情報を作る", () => {
    const resolver = setupResolver([
      createStaticCoordinator(identityResponses()),
    ]);

    expect(computeInverterIdentity(resolver)).toEqual({
      identifiers: [
        ["rct_power", "STORAGE", "123456"],
        ["rct_power", "123456"],
      ],
      name: "Garage",
      swVersion: "abc123",
      model: "RCT Power Storage",
      manufacturer: "RCT Power",
    });
  });

  test("値が取得できない場合は既定の値を使う", () => {
    const resolver = setupResolver([
      createStaticCoordinator([invalid(0x1001), invalid(0x1002)]),
    ]);

    expect(computeInverterIdentity(resolver)).toMatchObject({
      identifiers: [
        ["rct_power", "STORAGE", UNKNOWN_SERIAL],
        ["rct_power", UNKNOWN_SERIAL],
      ],
      name: "",
      swVersion: "",
    });
  });

  test("数値のシリアル番号は文字列にする", () => {
    const resolver = setupResolver([
      createStaticCoordinator([valid(0x1001, 42)]),
    ]);

    expect(computeInverterIdentity(resolver).identifiers[1]).toEqual([
      "rct_power",
      "42",
    ]);
  });
});

describe("computeBatteryIdentity", () => {
  test("バッテリーのデバイス情報はインバーターを経由する", () => {
    const resolver = setupResolver([
      createStaticCoordinator(identityResponses()),
    ]);

    expect(computeBatteryIdentity(resolver)).toEqual({
      identifiers: [
        ["rct_power", "BATTERY", "BMS-987"],
        ["rct_power", "BMS-987"],
      ],
      name: "Battery at Garage",
      swVersion: "4.2",
      model: "RCT Power Battery",
      manufacturer: "RCT Power",
      viaDevice: ["rct_power", "123456"],
    });
  });

  test("複数のコーディネーターから値を集める", () => {
    const [inverterSn, description, , bmsSn] = identityResponses();
    const resolver = setupResolver([
      createStaticCoordinator([bmsSn]),
      createStaticCoordinator([inverterSn, description]),
    ]);

    expect(computeBatteryIdentity(resolver)).toMatchObject({
      name: "Battery at Garage",
      swVersion: "",
      viaDevice: ["rct_power", "123456"],
    });
  });
});

describe("deviceInfo", () => {
  test("参照のたびに現在の値から計算する", () => {
    const coordinator = createStaticCoordinator([]);
    const entity = createEntity(
      createEntityDescription(testRegistry, {
        key: "battery.soc",
        device: "battery",
      }),
      [coordinator],
      testConfigEntry,
      testRegistry,
    );

    expect(entity.deviceInfo?.name).toBe("Battery at ");

    coordinator.responses.set(0x1002, valid(0x1002, "Garage"));

    expect(entity.deviceInfo?.name).toBe("Battery at Garage");
  });

  test("インバーターのエンティティはインバーターのデバイス情報を持つ", () => {
    const entity = createEntity(
      createEntityDescription(testRegistry, {
        key: "g_sync.p_ac_sum_lp",
        device: "inverter",
      }),
      [createStaticCoordinator(identityResponses())],
      testConfigEntry,
      testRegistry,
    );

    expect(entity.deviceInfo?.model).toBe("RCT Power Storage");
    expect(entity.deviceInfo?.viaDevice).toBeUndefined();
  });
});
