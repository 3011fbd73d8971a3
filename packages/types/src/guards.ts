/**
 * Runtime Type Guards
 *
 * Narrowing functions for values that arrive from outside the type
 * system (command inputs, configuration).
 */

/** Largest number of fractional digits an asset may carry. */
export const MAX_ASSET_DECIMALS = 8;

export function isAssetDecimals(value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_ASSET_DECIMALS
  );
}
