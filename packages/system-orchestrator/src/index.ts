/**
 * @tickwise/system-orchestrator - Wires the trading pipeline to its ports
 */

import { ConfigService } from '@tickwise/config';
import { Clock, Logger, onShutdown } from '@tickwise/utils';
import { TradingEngine, TradingPorts } from './TradingEngine';

export { TradingEngine } from './TradingEngine';
export type {
  CandleOutcome,
  EngineStatus,
  PositionStatus,
  StopReport,
  SymbolStatus,
  TickReport,
  TradingEngineOptions,
  TradingPorts
} from './TradingEngine';
export { SymbolLane } from './SymbolLane';

export interface TradingServiceOptions {
  configPath?: string;
  environment?: string;
  env?: NodeJS.ProcessEnv;
  now?: Clock;
  /** Register the engine with the process-wide shutdown handler */
  registerShutdown?: boolean;
}

/**
 * Load configuration, start an engine over the given ports and hook it into
 * graceful shutdown
 */
export async function startTradingService(
  ports: TradingPorts,
  options: TradingServiceOptions = {}
): Promise<TradingEngine> {
  const logger = new Logger('TradingService');

  try {
    logger.info('Starting Trading Service...');

    const configService = new ConfigService(logger.child('Config'), {
      configPath: options.configPath,
      env: options.env
    });
    const config = await configService.load(options.environment);
    logger.level = config.logLevel;

    const engine = new TradingEngine(config, ports, {
      now: options.now,
      logger: logger.child('TradingEngine')
    });
    await engine.start();

    if (options.registerShutdown ?? true) {
      onShutdown('trading-engine', async () => {
        logger.info('Shutting down trading engine...');
        const report = await engine.stop();
        logger.info('Trading engine shut down complete', {
          abandoned: report.abandoned,
          flattened: report.flattened.length
        });
      }, (config.shutdownGracePeriod + 5) * 1000);
    }

    logger.info('Trading Service started successfully');
    return engine;
  } catch (error) {
    logger.error('Failed to start Trading Service', error);
    throw error;
  }
}
