import { MeteredResetFrequency } from "@/const";

/**
 * 積算値が最後にリセットされた時刻を求めます。日付の境界はローカル時刻。
 */
export function getLastReset(
  frequency: MeteredResetFrequency,
  now: Date = new Date(),
): Date | undefined {
  switch (frequency) {
    case MeteredResetFrequency.NEVER:
      return undefined;
    case MeteredResetFrequency.INITIALLY:
      return new Date(0);
    case MeteredResetFrequency.DAILY:
      return new Date(now.getFullYear(), now.getMonth(), now.getDate());
    case MeteredResetFrequency.MONTHLY:
      return new Date(now.getFullYear(), now.getMonth(), 1);
    case MeteredResetFrequency.YEARLY:
      return new Date(now.getFullYear(), 0, 1);
    default: {
      const unsupportedFrequency: never = frequency;
      throw new Error(
        `Unsupported metered reset frequency: ${String(unsupportedFrequency)}`,
      );
    }
  }
}
