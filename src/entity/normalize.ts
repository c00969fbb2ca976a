import type { RawValue } from "@/api/apiResponse";
import { isBytes, isStructured, toHex } from "@/api/apiResponse";

export type DisplayValue = string | number | null;

/**
 * 小数第1位に丸めます。ちょうど中間の値は偶数側に丸める。
 */
export function roundTo1Decimal(value: number): number {
  // 小数第1位でちょうど中間になるのは x.25 と x.75 のみ
  const isTie = Number.isInteger(value * 4) && !Number.isInteger(value * 2);
  if (isTie) {
    const lower = Math.floor(value * 10);
    return (lower % 2 === 0 ? lower : lower + 1) / 10;
  }
  return Number(value.toFixed(1));
}

/**
 * レジスタの値を表示用の値に変換します。
 *
 * 割合 (%) のレジスタは 0〜1 の値を持つため100倍する。
 */
export function normalizeValue(
  value: RawValue | null,
  unit: string | undefined,
): DisplayValue {
  if (value === null) {
    return null;
  }
  if (isBytes(value)) {
    return toHex(value);
  }
  if (isStructured(value)) {
    return null;
  }
  if (typeof value === "number") {
    return roundTo1Decimal(unit === "%" ? value * 100 : value);
  }
  return value;
}
