/**
 * Decimal ↔ base-unit conversion for display and CLI input.
 * The ledger itself only ever sees integer base units.
 */

import { TOKEN_DECIMALS } from "./constants.js";

/** 1500000 → "1.5" (6 decimals). Trailing zeros trimmed. */
export function formatUnits(amount: number, decimals: number = TOKEN_DECIMALS): string {
  if (!Number.isSafeInteger(amount) || amount < 0) {
    throw new Error(`Invalid base-unit amount: ${amount}`);
  }
  const digits = String(amount).padStart(decimals + 1, "0");
  const whole = digits.slice(0, digits.length - decimals);
  const frac = digits.slice(digits.length - decimals).replace(/0+$/, "");
  return frac.length > 0 ? `${whole}.${frac}` : whole;
}

/** "1.5" → 1500000 (6 decimals). Rejects negatives, excess precision, non-numbers. */
export function parseUnits(value: string, decimals: number = TOKEN_DECIMALS): number {
  const match = /^(\d+)(?:\.(\d+))?$/.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid amount: ${value}`);
  }
  const whole = match[1] ?? "0";
  const frac = match[2] ?? "";
  if (frac.length > decimals) {
    throw new Error(`Invalid amount: ${value} has more than ${decimals} decimals`);
  }
  const units = Number(whole + frac.padEnd(decimals, "0"));
  if (!Number.isSafeInteger(units)) {
    throw new Error(`Invalid amount: ${value} is too large`);
  }
  return units;
}
