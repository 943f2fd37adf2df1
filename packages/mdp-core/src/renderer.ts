/**
 * Snapshot rendering
 *
 *   After iteration 2: (S1 b 9.0000) (S2 None 10.0000)
 *
 * Pure reads: rendering never extends the engine.
 */

import type { PolicySnapshot } from '@bellman/mdp-contracts';
import { DEFAULT_PRECISION, NO_ACTION_LABEL } from '@bellman/mdp-contracts';
import type { PolicyEngine } from './policy-engine.js';

export interface RenderOptions {
  /** Decimal places of values (default 4) */
  precision?: number;
}

/** Extra digits inspected to tell an exact halfway value from a near one */
const TIE_DIGITS = 30;

/**
 * Fixed-point formatting with round-half-to-even on exact binary ties.
 *
 * `toFixed` rounds exact ties away from zero (0.03125 -> "0.0313");
 * here they go to the even digit (0.03125 -> "0.0312", 0.09375 -> "0.0938").
 */
export function formatValue(value: number, precision: number = DEFAULT_PRECISION): string {
  if (Number.isNaN(value)) {return 'nan';}
  if (value === Infinity) {return 'inf';}
  if (value === -Infinity) {return '-inf';}

  const rounded = value.toFixed(precision);
  if (Math.abs(value) >= 1e21) {return rounded;}

  // toFixed expands the exact binary value, so a tie shows as 5 then zeros
  const exact = Math.abs(value).toFixed(Math.min(precision + TIE_DIGITS, 100));
  const dot = exact.indexOf('.');
  const cut = precision === 0 ? dot : dot + 1 + precision;
  const tail = exact.slice(cut).replace('.', '');
  if (!/^50*$/.test(tail)) {return rounded;}

  const truncated = exact.slice(0, cut);
  const lastDigit = Number(truncated.charAt(truncated.length - 1));
  if (lastDigit % 2 === 1) {return rounded;}
  return value < 0 ? `-${truncated}` : truncated;
}

/**
 * Render one snapshot as a single line. `index` is 0-based.
 */
export function renderSnapshot(
  snapshot: PolicySnapshot,
  index: number,
  options: RenderOptions = {}
): string {
  let line = `After iteration ${index + 1}:`;
  for (const [state, entry] of snapshot) {
    line += ` (${state} ${entry.action ?? NO_ACTION_LABEL} ${formatValue(entry.value, options.precision)})`;
  }
  return line;
}

/**
 * Render iterations [0, end) as newline-separated lines.
 * `end` is clamped to the cached history and defaults to all of it.
 */
export function renderHistory(
  engine: Pick<PolicyEngine, 'length' | 'snapshot'>,
  end: number = engine.length,
  options: RenderOptions = {}
): string {
  const last = Math.min(end, engine.length);
  const lines: string[] = [];
  for (let i = 0; i < last; i++) {
    const snapshot = engine.snapshot(i);
    if (snapshot) {
      lines.push(renderSnapshot(snapshot, i, options));
    }
  }
  return lines.join('\n');
}
