export const DOMAIN = "rct_power";
export const NAME = "RCT Power";
export const ICON = "mdi:solar-power";
export const INVERTER_MODEL = "RCT Power Storage";
export const BATTERY_MODEL = "RCT Power Battery";

export const EntityUpdatePriority = {
  FREQUENT: "FREQUENT",
  INFREQUENT: "INFREQUENT",
  STATIC: "STATIC",
} as const;
export type EntityUpdatePriority =
  (typeof EntityUpdatePriority)[keyof typeof EntityUpdatePriority];

// 優先度の高い順
export const EntityUpdatePriorities: readonly EntityUpdatePriority[] = [
  EntityUpdatePriority.FREQUENT,
  EntityUpdatePriority.INFREQUENT,
  EntityUpdatePriority.STATIC,
];

export const MeteredResetFrequency = {
  NEVER: "NEVER",
  INITIALLY: "INITIALLY",
  DAILY: "DAILY",
  MONTHLY: "MONTHLY",
  YEARLY: "YEARLY",
} as const;
export type MeteredResetFrequency =
  (typeof MeteredResetFrequency)[keyof typeof MeteredResetFrequency];
