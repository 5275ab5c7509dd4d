/**
 * Estimation Engine Types
 */

import type { Confidence, Fact, FactValue } from '../facts/types.js';

export type CategoryId = 'macro' | 'demand' | 'supply';

export const CATEGORY_IDS: readonly CategoryId[] = ['macro', 'demand', 'supply'];

export type ComponentId = 'comp_macro' | 'comp_demand' | 'comp_supply' | 'comp_tria';

export type ComponentStatus = 'empty' | 'complete';

/** fact key -> multiplier applied to the resolved value */
export type Overrides = Readonly<Record<string, number>>;

export type MatchKind = 'exact' | 'alias' | 'fuzzy';

export interface Resolution {
  fact: Fact;
  requestedKey: string;
  matchedKey: string;
  match: MatchKind;
  /** Similarity of the matched key, 1 for exact matches */
  similarity: number;
}

export interface InputBinding {
  variable: string;
  requestedKey: string;
  resolvedKey: string;
  match: MatchKind;
  similarity: number;
}

export interface EstimationStrategy {
  readonly id: string;
  readonly name: string;
  /** Arithmetic over `{variable}` placeholders */
  readonly formulaTemplate: string;
  /** local variable -> canonical fact key */
  readonly requiredInputs: Readonly<Record<string, string>>;
  readonly description: string;
  readonly methodologyText: string;
  readonly realityAdjustmentApplicable: boolean;
}

export interface CategoryDefinition {
  readonly id: CategoryId;
  readonly componentId: ComponentId;
  readonly name: string;
  readonly shortLabel: string;
  readonly role: string;
  readonly color: string;
  readonly strategies: readonly EstimationStrategy[];
}

export interface EstimationResult {
  value: number | null;
  formulaUsed: string;
  calculationDetails: string;
  confidence: Confidence;
  missingInputs: string[];
  usedProxies: string[];
  realityFactor: number;
  frictionExplanation: string;
  frictionAdjustments: FrictionAdjustment[];
  bindings: InputBinding[];
  /** Facts behind the resolved inputs, as stored (before overrides) */
  dataUsed: Fact[];
}

export interface EstimationComponent {
  id: ComponentId;
  name: string;
  role: string;
  methodDescription: string;
  dataUsed: Fact[];
  missingDataStrategy: string;
  estimatedValue: number | null;
  unit: string;
  confidence: Confidence;
  status: ComponentStatus;
  /** Presentation hint */
  color: string;
  selectedStrategyName: string;
  calculationBreakdown: string;
  methodologyText: string;
  strategicNarrative: string;
  realityScore: string;
  realityFactor: number;
  /** Number of estimates behind the value: 0 or 1 for a category, n for triangulation */
  contributingMethodCount: number;
  bindings: InputBinding[];
}

export interface FrictionAdjustment {
  signal: 'sales_cycle' | 'maturity' | 'competition';
  factor: number;
  label: string;
}

export interface FrictionResult {
  multiplier: number;
  explanation: string;
  adjustments: FrictionAdjustment[];
}

export type SensitivityClass = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export type AdjustedConfidence = 'LOW' | 'MEDIUM' | 'HIGH';

export interface SensitivityVariable {
  key: string;
  name: string;
  /** Only non-zero numbers can be perturbed */
  baseValue: FactValue | undefined;
  unit: string;
}

/** Hypothesis as produced by an upstream generator; field names vary */
export interface Hypothesis {
  variable?: string;
  key?: string;
  name?: string;
  central_value?: number | null;
  value?: number | null;
  unit?: string;
}

export interface SensitivityScenario {
  /** Perturbed input value */
  value: number;
  /** Re-estimated component value */
  result: number;
  deltaPct: number;
}

export interface SensitivityTest {
  hypothesis: string;
  key: string;
  base: number;
  unit: string;
  lowScenario: SensitivityScenario;
  highScenario: SensitivityScenario;
  score: number;
  sensitivity: SensitivityClass;
}

export interface SensitivityReport {
  componentId: ComponentId;
  baseValue: number | null;
  tests: SensitivityTest[];
  mostSensitiveVariables: string[];
  confidenceAdjusted: AdjustedConfidence;
  maxSensitivityScore: number;
  error?: string;
}

export interface WaterfallStep {
  measure: 'absolute' | 'relative' | 'total';
  label: string;
  value: number;
  text: string;
}

export type EstimationLevel = 0 | 1 | 2 | 3;

export interface EstimationLevelAssessment {
  level: EstimationLevel;
  confidenceScore: number;
  method: 'None' | 'Top-Down' | 'Bottom-Up' | 'Triangulation';
  explanation: string;
}

export interface FactsTableRow {
  factId: string;
  key: string;
  variable: string;
  value: string;
  source: string;
  sourceType: string;
  confidence: string;
  usedIn: string;
}
