export type DeviceClass =
  | "power"
  | "energy"
  | "voltage"
  | "current"
  | "temperature"
  | "frequency"
  | "apparent_power"
  | "reactive_power"
  | "battery"
  | "duration";

export type StateClass = "measurement" | "total" | "total_increasing";

const UnitDeviceClasses: ReadonlyMap<string, DeviceClass> = new Map([
  ["W", "power"],
  ["kW", "power"],
  ["Wh", "energy"],
  ["kWh", "energy"],
  ["V", "voltage"],
  ["A", "current"],
  ["°C", "temperature"],
  ["Hz", "frequency"],
  ["VA", "apparent_power"],
  ["var", "reactive_power"],
  ["s", "duration"],
]);

export function guessDeviceClassFromUnit(
  unit: string,
): DeviceClass | undefined {
  return UnitDeviceClasses.get(unit);
}

/**
 * 明示的な指定がなければ単位から推測する
 */
export function resolveDeviceClass(
  override: DeviceClass | undefined,
  unit: string | undefined,
): DeviceClass | undefined {
  if (override) {
    return override;
  }
  return unit ? guessDeviceClassFromUnit(unit) : undefined;
}
