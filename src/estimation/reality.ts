/**
 * Market Reality Adjuster
 *
 * Structural friction between a theoretical market and what can actually be
 * sold into it. Each signal that is present shrinks the multiplier:
 * - Sales cycle: long cycles slow adoption
 * - Maturity: immature markets get up to a 50% haircut
 * - Competition: crowded markets lose another 10%
 */

import type { Fact } from '../facts/types.js';
import type { FrictionAdjustment, FrictionResult } from './types.js';
import type { FactResolver } from './resolver.js';

export const SALES_CYCLE_KEY = 'sales_cycle_months';
export const MATURITY_KEY = 'market_maturity_score';
export const COMPETITOR_COUNT_KEY = 'competitor_count';

export interface FrictionPolicy {
  /** Cycles longer than this (months) add friction */
  salesCycleMinMonths: number;
  /** Cycles longer than this (months) count as long */
  salesCycleLongMonths: number;
  salesCycleFactor: number;
  longSalesCycleFactor: number;
  /** Multiplier at maturity 0; maturity 1 maps to 1.0 */
  maturityFloor: number;
  competitorThreshold: number;
  competitionFactor: number;
}

export const DEFAULT_FRICTION_POLICY: Readonly<FrictionPolicy> = {
  salesCycleMinMonths: 6,
  salesCycleLongMonths: 12,
  salesCycleFactor: 0.9,
  longSalesCycleFactor: 0.75,
  maturityFloor: 0.5,
  competitorThreshold: 50,
  competitionFactor: 0.9,
};

export const NO_FRICTION_EXPLANATION = 'No friction applied';

function numberFrom(fact: Fact | undefined): number | null {
  const value = fact?.value;
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/** Competitors may be recorded as a list of names or as a plain count */
function countFrom(fact: Fact | undefined): number {
  const value = fact?.value;
  if (Array.isArray(value)) return value.length;
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

export function computeFriction(
  resolver: FactResolver,
  policy: Readonly<FrictionPolicy> = DEFAULT_FRICTION_POLICY
): FrictionResult {
  const adjustments: FrictionAdjustment[] = [];

  const cycle = numberFrom(resolver.resolve(SALES_CYCLE_KEY)?.fact);
  if (cycle !== null && cycle > policy.salesCycleMinMonths) {
    const factor = cycle <= policy.salesCycleLongMonths ? policy.salesCycleFactor : policy.longSalesCycleFactor;
    adjustments.push({ signal: 'sales_cycle', factor, label: `Sales Cycle Friction x${factor}` });
  }

  const maturity = numberFrom(resolver.resolve(MATURITY_KEY)?.fact);
  if (maturity !== null) {
    const clamped = Math.min(1, Math.max(0, maturity));
    const factor = policy.maturityFloor + (1 - policy.maturityFloor) * clamped;
    adjustments.push({ signal: 'maturity', factor, label: `Maturity Adj x${factor.toFixed(2)}` });
  }

  const competitors = countFrom(resolver.resolve(COMPETITOR_COUNT_KEY)?.fact);
  if (competitors > policy.competitorThreshold) {
    const factor = policy.competitionFactor;
    adjustments.push({ signal: 'competition', factor, label: `High Competition x${factor}` });
  }

  const multiplier = adjustments.reduce((product, adjustment) => product * adjustment.factor, 1);

  return {
    multiplier,
    explanation: adjustments.length > 0
      ? adjustments.map(adjustment => adjustment.label).join(', ')
      : NO_FRICTION_EXPLANATION,
    adjustments,
  };
}
