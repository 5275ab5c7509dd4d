export * from './types.js';
export { MarketEstimationEngine, engineOptionsFromConfig, type EngineOptions } from './engine.js';
export { FactResolver, DEFAULT_ALIASES, ALIAS_MATCH_THRESHOLD, FUZZY_MATCH_THRESHOLD } from './resolver.js';
export { similarityRatio, findClosestMatch } from './similarity.js';
export { evaluate, evaluateExpression, substitute } from './formula.js';
export { aggregateConfidence } from './confidence.js';
export { computeFriction, DEFAULT_FRICTION_POLICY, type FrictionPolicy } from './reality.js';
export { ComponentSolver, componentNarrative } from './solver.js';
export { CATEGORIES, TRIANGULATION, isCategoryId } from './strategies.js';
export { triangulate } from './triangulation.js';
export { selectBest } from './selector.js';
export { analyzeSensitivity, classifySensitivity, adjustConfidence, parseHypotheses } from './sensitivity.js';
export { getWaterfallData, generateStrategicSummary, assessEstimationLevel, buildFactsTable } from './insights.js';
