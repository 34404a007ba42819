/**
 * @tickwise/strategy - Indicators and entry signals
 */

export {
  IndicatorEngine,
  emaSeries,
  relativeStrengthIndex,
  bollingerBands
} from './IndicatorEngine';
export type { BollingerBands } from './IndicatorEngine';
export { SignalGenerator, STRENGTH_WEIGHTS, strengthOf } from './SignalGenerator';
export type {
  DirectionCheck,
  SignalDiagnostics,
  SignalEvaluation,
  SignalGeneratorSettings,
  SignalInput
} from './SignalGenerator';
export { MarketConditionFilter, VOLUME_AVERAGE_PERIOD } from './MarketConditionFilter';
export type { MarketAssessment, MarketConditionSettings } from './MarketConditionFilter';
