import type { RawValue } from "@/api/apiResponse";
import { isBytes, isStructured, toHex } from "@/api/apiResponse";
import { BATTERY_MODEL, DOMAIN, INVERTER_MODEL, NAME } from "@/const";
import type { DeviceKind } from "@/entity/description";
import type { EntityResolver } from "@/entity/resolver";

export type DeviceIdentifier = readonly string[];

export type DeviceIdentity = {
  readonly identifiers: readonly DeviceIdentifier[];
  readonly name: string;
  readonly swVersion: string;
  readonly model: string;
  readonly manufacturer: string;
  readonly viaDevice?: DeviceIdentifier;
};

// シリアル番号が未取得の間に使う
export const UNKNOWN_SERIAL = "unknown";

function formatIdentityValue(value: RawValue | null, fallback: string): string {
  if (value === null || isStructured(value)) {
    return fallback;
  }
  if (isBytes(value)) {
    return toHex(value);
  }
  return String(value);
}

function getInverterSerial(resolver: EntityResolver): string {
  return formatIdentityValue(
    resolver.resolveValueByName("inverter_sn", null),
    UNKNOWN_SERIAL,
  );
}

function getInverterDescription(resolver: EntityResolver): string {
  return formatIdentityValue(
    resolver.resolveValueByName("android_description", null),
    "",
  );
}

export function computeInverterIdentity(
  resolver: EntityResolver,
): DeviceIdentity {
  const inverterSn = getInverterSerial(resolver);

  return {
    // "STORAGE" 付きの識別子は以前のバージョンで登録されたデバイスとの互換用
    identifiers: [
      [DOMAIN, "STORAGE", inverterSn],
      [DOMAIN, inverterSn],
    ],
    name: getInverterDescription(resolver),
    swVersion: formatIdentityValue(
      resolver.resolveValueByName("svnversion", null),
      "",
    ),
    model: INVERTER_MODEL,
    manufacturer: NAME,
  };
}

export function computeBatteryIdentity(
  resolver: EntityResolver,
): DeviceIdentity {
  const bmsSn = formatIdentityValue(
    resolver.resolveValueByName("battery.bms_sn", null),
    UNKNOWN_SERIAL,
  );

  return {
    identifiers: [
      [DOMAIN, "BATTERY", bmsSn],
      [DOMAIN, bmsSn],
    ],
    name: `Battery at ${getInverterDescription(resolver)}`,
    swVersion: formatIdentityValue(
      resolver.resolveValueByName("battery.bms_software_version", null),
      "",
    ),
    model: BATTERY_MODEL,
    manufacturer: NAME,
    viaDevice: [DOMAIN, getInverterSerial(resolver)],
  };
}

export function computeDeviceIdentity(
  device: DeviceKind,
  resolver: EntityResolver,
): DeviceIdentity {
  switch (device) {
    case "inverter":
      return computeInverterIdentity(resolver);
    case "battery":
      return computeBatteryIdentity(resolver);
    default: {
      const unsupportedDevice: never = device;
      throw new Error(`Unsupported device: ${String(unsupportedDevice)}`);
    }
  }
}
