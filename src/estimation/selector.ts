/**
 * Best-Method Selector
 *
 * Convergent triangulation beats any single method; otherwise demand data is
 * trusted over supply reconstruction, which is trusted over top-down.
 */

import type { EstimationComponent } from './types.js';

export function selectBest(
  macro: EstimationComponent,
  demand: EstimationComponent,
  supply: EstimationComponent,
  triangulation: EstimationComponent
): EstimationComponent {
  if (triangulation.estimatedValue !== null && triangulation.contributingMethodCount >= 2) {
    return triangulation;
  }
  if (demand.status === 'complete') return demand;
  if (supply.status === 'complete') return supply;
  return macro;
}
