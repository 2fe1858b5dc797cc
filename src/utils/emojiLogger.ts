/**
 * Enhanced logger with emoji support for better visualization
 */
import { logger } from './logger';

export const emojiLogger = {
  success: (message: string, data?: unknown) => {
    logger.info(`✅ ${message}`, data);
  },

  warn: (message: string, data?: unknown) => {
    logger.warn(`⚠️ ${message}`, data);
  },

  classify: (message: string, data?: unknown) => {
    logger.info(`🔠 CLASSIFY: ${message}`, data);
  },

  trigger: (message: string, data?: unknown) => {
    logger.info(`🎯 TRIGGER: ${message}`, data);
  },

  pipeline: (message: string, data?: unknown) => {
    logger.info(`🔄 PIPELINE: ${message}`, data);
  },

  document: (message: string, data?: unknown) => {
    logger.info(`📄 DOCUMENT: ${message}`, data);
  },

  apiCall: (message: string, data?: unknown) => {
    logger.info(`🚀 API CALL: ${message}`, data);
  },

  apiResponse: (message: string, timeMs: number, data?: unknown) => {
    logger.info(`⏱️ API RESPONSE: ${message} - ${timeMs.toFixed(2)}ms`, data);
  },

  retrying: (attempt: number, maxAttempts: number, data?: unknown) => {
    logger.warn(`🔁 RETRY ${attempt}/${maxAttempts}`, data);
  },

  apiCallFailure: (service: string, model: string, error: string) => {
    logger.error(`❌ API FAILURE: ${service} (${model}) - Error: ${error}`);
  },

  jsonSummary: (obj: unknown, label: string = 'SUMMARY') => {
    logger.debug(`📋 ${label}: ${JSON.stringify(obj, null, 2)}`);
  },

  timerStart: (label: string) => {
    const startTime = Date.now();
    return () => {
      const elapsed = Date.now() - startTime;
      logger.debug(`⏱️ TIMER: ${label} completed in ${elapsed}ms`);
      return elapsed;
    };
  },
};

export default emojiLogger;
