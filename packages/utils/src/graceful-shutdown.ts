/**
 * Graceful Shutdown Utility
 *
 * Runs registered cleanup handlers when the process is asked to stop.
 * Each handler gets its own timeout and the whole sequence is bounded by a
 * global timeout, after which remaining work is abandoned.
 */

import { Logger } from './index';

export interface ShutdownHandler {
  name: string;
  cleanup: () => Promise<void>;
  timeout?: number;  // Optional timeout in milliseconds
}

export interface ShutdownOptions {
  timeout?: number;
  installSignalHandlers?: boolean;
  exitProcess?: boolean;
}

export interface ShutdownReport {
  signal: string;
  completed: string[];
  failed: string[];
}

export class GracefulShutdown {
  private handlers: ShutdownHandler[] = [];
  private isShuttingDown: boolean = false;
  private shutdownTimeout: number = 30000;  // 30 seconds default
  private readonly exitProcess: boolean;
  private readonly logger = new Logger('GracefulShutdown');

  constructor(options: ShutdownOptions = {}) {
    if (options.timeout) {
      this.shutdownTimeout = options.timeout;
    }
    this.exitProcess = options.exitProcess ?? true;

    if (options.installSignalHandlers ?? true) {
      this.setupSignalHandlers();
    }
  }

  /**
   * Register a cleanup handler
   */
  public registerHandler(handler: ShutdownHandler): void {
    this.handlers.push(handler);
  }

  private setupSignalHandlers(): void {
    for (const signal of ['SIGTERM', 'SIGINT', 'SIGQUIT'] as const) {
      process.on(signal, () => {
        this.logger.info(`Received ${signal} signal`);
        void this.shutdown(signal);
      });
    }

    process.on('unhandledRejection', (reason: unknown) => {
      this.logger.error('Unhandled rejection', reason);
      void this.shutdown('unhandledRejection', 1);
    });
  }

  /**
   * Execute shutdown sequence
   */
  public async shutdown(signal: string, exitCode: number = 0): Promise<ShutdownReport> {
    const report: ShutdownReport = { signal, completed: [], failed: [] };

    if (this.isShuttingDown) {
      this.logger.warn('Shutdown already in progress, ignoring signal', { signal });
      return report;
    }

    this.isShuttingDown = true;
    this.logger.info('Initiating graceful shutdown', { signal, handlers: this.handlers.length });

    let forceExitTimer: NodeJS.Timeout | undefined;
    const deadline = new Promise<'timeout'>(resolve => {
      forceExitTimer = setTimeout(() => resolve('timeout'), this.shutdownTimeout);
    });

    const cleanups = Promise.all(this.handlers.map(handler => this.runHandler(handler, report)));
    const outcome = await Promise.race([cleanups.then(() => 'done' as const), deadline]);
    clearTimeout(forceExitTimer);

    if (outcome === 'timeout') {
      const pending = this.handlers
        .map(h => h.name)
        .filter(name => !report.completed.includes(name) && !report.failed.includes(name));
      this.logger.error(`Shutdown timeout exceeded (${this.shutdownTimeout}ms), abandoning remaining work`, undefined, { pending });
      report.failed.push(...pending);
      exitCode = 1;
    } else {
      this.logger.info('Graceful shutdown complete', { completed: report.completed.length, failed: report.failed.length });
    }

    if (this.exitProcess) {
      process.exit(exitCode);
    }

    return report;
  }

  private async runHandler(handler: ShutdownHandler, report: ShutdownReport): Promise<void> {
    const handlerTimeout = handler.timeout || 10000;  // 10 seconds default per handler
    let timer: NodeJS.Timeout | undefined;

    try {
      this.logger.info(`Cleaning up: ${handler.name}`);

      const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error(`Timeout: ${handler.name}`)), handlerTimeout);
      });

      await Promise.race([handler.cleanup(), timeoutPromise]);

      report.completed.push(handler.name);
      this.logger.info(`${handler.name} cleaned up successfully`);
    } catch (error) {
      report.failed.push(handler.name);
      this.logger.error(`${handler.name} cleanup failed`, error);
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Create a singleton instance for easy use across the application
 */
let shutdownInstance: GracefulShutdown | null = null;

export function getShutdownHandler(options?: ShutdownOptions): GracefulShutdown {
  if (!shutdownInstance) {
    shutdownInstance = new GracefulShutdown(options);
  }
  return shutdownInstance;
}

/**
 * Helper function to register a cleanup handler
 */
export function onShutdown(name: string, cleanup: () => Promise<void>, timeout?: number): void {
  const handler = getShutdownHandler();
  handler.registerHandler({ name, cleanup, timeout });
}
