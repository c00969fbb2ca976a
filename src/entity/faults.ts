import knownFaultsJson from "~/data/knownFaults.json";

const BITS_PER_MASK = 32;

/**
 * 4つのフォルトビットマスクを通したビット位置ごとの説明
 */
export const knownFaults: readonly string[] = Object.freeze([
  ...knownFaultsJson,
]);

/**
 * 立っているビットに対応するフォルトの説明を返します
 */
export function describeFaults(bitmasks: readonly number[]): string[] {
  return bitmasks.flatMap((bitmask, maskIndex) => {
    const descriptions: string[] = [];
    for (let bit = 0; bit < BITS_PER_MASK; bit++) {
      if (Math.floor(bitmask / 2 ** bit) % 2 === 1) {
        const position = maskIndex * BITS_PER_MASK + bit;
        descriptions.push(
          knownFaults[position] ?? `Unknown fault (mask ${maskIndex}, bit ${bit})`,
        );
      }
    }
    return descriptions;
  });
}
