import { getLogger } from '@kernel/logger';
import { getTimeoutConfig } from '@config';

/**
* Shutdown Manager
*
* Single owner of SIGTERM/SIGINT. Components register cleanup work here
* (closing the HTTP server) instead of installing their own signal handlers.
*/

const logger = getLogger({ service: 'shutdown' });

export type ShutdownHandler = () => Promise<void> | void;

const handlers: Set<ShutdownHandler> = new Set();

let isShuttingDown = false;

/**
* Register a shutdown handler to be called during graceful shutdown
* @returns Function to unregister the handler
*/
export function registerShutdownHandler(handler: ShutdownHandler): () => void {
  handlers.add(handler);
  return () => handlers.delete(handler);
}

export function clearShutdownHandlers(): void {
  handlers.clear();
}

export function getHandlerCount(): number {
  return handlers.size;
}

async function runHandler(handler: ShutdownHandler, index: number, timeoutMs: number): Promise<void> {
  const handlerName = handler.name || `handler-${index}`;
  let timer: ReturnType<typeof setTimeout> | undefined;
  try {
    await Promise.race([
      Promise.resolve(handler()),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error(`Handler ${handlerName} timed out`)), timeoutMs);
      }),
    ]);
    logger.info(`Shutdown handler ${handlerName} completed`);
  } catch (err) {
    // One failing handler must not stop the others
    logger.error(`Shutdown handler ${handlerName} failed`, err instanceof Error ? err : new Error(String(err)));
  } finally {
    clearTimeout(timer);
  }
}

/**
* Run every registered handler, then exit.
* @param exitCode - 0 for graceful, 1 for forced
*/
export async function gracefulShutdown(
  signal: string,
  exitCode = 0,
  exit: (code: number) => void = code => process.exit(code)
): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info(`Received ${signal}, starting graceful shutdown`);

  const timeoutMs = getTimeoutConfig().shutdown;
  await Promise.all(Array.from(handlers).map((handler, index) => runHandler(handler, index, timeoutMs)));

  exit(exitCode);
}

export function resetShutdownState(): void {
  isShuttingDown = false;
}

export function getIsShuttingDown(): boolean {
  return isShuttingDown;
}

let isRegistered = false;

/**
* Install SIGTERM/SIGINT listeners once
*/
export function setupShutdownHandlers(): void {
  if (isRegistered) return;
  isRegistered = true;

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      gracefulShutdown(signal).catch((error: unknown) => {
        logger.fatal(`${signal} shutdown error`, error instanceof Error ? error : new Error(String(error)));
        process.exit(1);
      });
    });
  }
}
