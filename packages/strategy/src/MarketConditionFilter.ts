import * as ss from 'simple-statistics';
import { TradingSettings } from '@tickwise/config';
import { Candle, IndicatorSnapshot } from '@tickwise/types';
import { Logger } from '@tickwise/utils';

export const VOLUME_AVERAGE_PERIOD = 20;

export type MarketConditionSettings = Pick<
  TradingSettings,
  'requireMarketConfirmation' | 'volumeSurgeFactor' | 'minPriceChangePercent' | 'minRsiChange'
>;

export interface MarketAssessment {
  volumeConfirmed: boolean;
  significantChange: boolean;
  proceed: boolean;
}

interface Baseline {
  price: number;
  rsi: number;
  trendUp: boolean;
}

/**
 * Gate in front of signal evaluation: a volume surge over the recent average
 * plus a material move since the symbol was last assessed. Disabled unless
 * `requireMarketConfirmation` is set.
 */
export class MarketConditionFilter {
  private baselines: Map<string, Baseline> = new Map();
  private logger: Logger;

  constructor(private readonly settings: MarketConditionSettings, logger?: Logger) {
    this.logger = logger ?? new Logger('MarketConditionFilter');
  }

  get enabled(): boolean {
    return this.settings.requireMarketConfirmation;
  }

  assess(symbol: string, candles: readonly Candle[], snapshot: IndicatorSnapshot): MarketAssessment {
    if (!this.enabled) {
      return { volumeConfirmed: true, significantChange: true, proceed: true };
    }

    const volumeConfirmed = this.hasVolumeSurge(candles);
    const significantChange = this.hasSignificantChange(symbol, snapshot);

    this.logger.debug(`Market conditions for ${symbol}`, { volumeConfirmed, significantChange });

    return { volumeConfirmed, significantChange, proceed: volumeConfirmed && significantChange };
  }

  reset(symbol?: string): void {
    if (symbol) {
      this.baselines.delete(symbol);
    } else {
      this.baselines.clear();
    }
  }

  private hasVolumeSurge(candles: readonly Candle[]): boolean {
    if (candles.length < VOLUME_AVERAGE_PERIOD) {
      return false;
    }

    const volumes = candles.slice(-VOLUME_AVERAGE_PERIOD).map(candle => candle.volume);
    const average = ss.mean(volumes);
    return volumes[volumes.length - 1] > average * this.settings.volumeSurgeFactor;
  }

  private hasSignificantChange(symbol: string, snapshot: IndicatorSnapshot): boolean {
    const current: Baseline = {
      price: snapshot.close,
      rsi: snapshot.rsi,
      trendUp: snapshot.emaShort > snapshot.emaLong
    };
    const previous = this.baselines.get(symbol);
    this.baselines.set(symbol, current);

    if (!previous) {
      return false;
    }

    const priceChange = (Math.abs(current.price - previous.price) / previous.price) * 100;
    const rsiChange = Math.abs(current.rsi - previous.rsi);

    return (
      priceChange > this.settings.minPriceChangePercent ||
      rsiChange > this.settings.minRsiChange ||
      current.trendUp !== previous.trendUp
    );
  }
}
