import { errorMessage, logger } from './logger.js';

const log = logger.createContext('error-handlers');

/**
 * Install global process error handlers
 * This should be called once at application startup
 */
export function installGlobalErrorHandlers(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    const message = errorMessage(reason);
    if (isBrowserError(message)) {
      // Expected when a context is closed under an in-flight navigation
      log.debug(`Unhandled browser error (non-fatal): ${message}`);
      return;
    }

    log.error(`Unhandled Promise Rejection: ${message}`, reason);
    process.exitCode = 1;
  });

  process.on('uncaughtException', (err: Error, origin: string) => {
    if (isBrowserError(err.message)) {
      log.debug(`Uncaught browser error (non-fatal): ${err.message}`);
      return;
    }

    // The process is in an undefined state
    log.error(`FATAL: Uncaught Exception (${origin}): ${err.message}`, err);
    process.exit(1);
  });

  log.debug('Global error handlers installed');
}

/**
 * Check if an error is related to a browser, context or page being closed
 */
export function isBrowserError(message: string | null | undefined): boolean {
  if (!message) return false;

  const lowerMessage = message.toLowerCase();
  return lowerMessage.includes('target page, context or browser has been closed') ||
         lowerMessage.includes('browser has been closed') ||
         lowerMessage.includes('context has been closed') ||
         lowerMessage.includes('target closed') ||
         lowerMessage.includes('browser is closed') ||
         lowerMessage.includes('execution context was destroyed') ||
         lowerMessage.includes('page has been closed');
}
