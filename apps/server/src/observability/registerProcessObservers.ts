export interface ObservedProcess {
  on(event: string, listener: (...args: unknown[]) => void): unknown;
}

export interface ObserverLogger {
  error(obj: unknown, msg?: string): void;
  info(msg: string): void;
}

export interface ProcessObserverOptions {
  proc: ObservedProcess;
  logger: ObserverLogger;
  shutdown: () => Promise<void>;
}

const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

const observedProcesses = new WeakSet<ObservedProcess>();

export function registerProcessObservers(options: ProcessObserverOptions): void {
  const { proc, logger, shutdown } = options;

  if (observedProcesses.has(proc)) {
    return;
  }

  proc.on('uncaughtException', (error) => {
    logger.error({ err: error }, 'uncaught exception');
  });

  proc.on('unhandledRejection', (reason) => {
    logger.error({ err: reason }, 'unhandled rejection');
  });

  let shuttingDown = false;

  for (const signal of SHUTDOWN_SIGNALS) {
    proc.on(signal, () => {
      if (shuttingDown) {
        return;
      }
      shuttingDown = true;
      logger.info(`received ${signal}, closing server`);
      shutdown().catch((error: unknown) => {
        logger.error({ err: error }, 'failed to close server');
      });
    });
  }

  observedProcesses.add(proc);
}
