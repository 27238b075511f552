/**
 * Configuration centralisée des variables d'environnement
 * Supporte les formats booléens multiples et validation
 */
import 'dotenv/config';
import { IANAZone } from 'luxon';
import { logger } from '../core/StructuredLogger';

// Helpers pour parser les valeurs
export const toBool = (value: string | undefined, defaultValue: boolean = false): boolean => {
  if (value == null || value.trim() === '') return defaultValue;
  return /^(1|true|yes|on)$/i.test(value.trim());
};

export const toNumber = (value?: string, defaultValue: number = 0): number => {
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
};

export const toString = (value?: string, defaultValue: string = ''): string => {
  return value?.trim() || defaultValue;
};

export interface AppConfig {
  NODE_ENV: string;
  LOG_LEVEL: string;

  TELEGRAM_ENABLED: boolean;
  TELEGRAM_BOT_TOKEN: string;
  TELEGRAM_CHAT_ID: string;

  POLL_INTERVAL_MS: number;
  HTTP_TIMEOUT_MS: number;

  RECORD_FILE: string;
  BACKUP_ENABLED: boolean;
  BASELINE_ATTEMPTS: number;
  BASELINE_RETRY_MS: number;
  TIMEZONE: string;

  HTTP_ENABLED: boolean;
  HTTP_PORT: number;
  HISTORY_LIMIT: number;
  SUMMARY_PER_SOURCE: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    // Environnement
    NODE_ENV: toString(env.NODE_ENV, 'development'),
    LOG_LEVEL: toString(env.LOG_LEVEL, 'info'),

    // Telegram
    TELEGRAM_ENABLED: toBool(env.TELEGRAM_ENABLED),
    TELEGRAM_BOT_TOKEN: toString(env.TELEGRAM_BOT_TOKEN),
    TELEGRAM_CHAT_ID: toString(env.TELEGRAM_CHAT_ID),

    // Polling (3 min comme le bot d'origine)
    POLL_INTERVAL_MS: toNumber(env.POLL_INTERVAL_MS, 180000),
    HTTP_TIMEOUT_MS: toNumber(env.HTTP_TIMEOUT_MS, 10000),

    // Stockage
    RECORD_FILE: toString(env.RECORD_FILE, './data/records.json'),
    BACKUP_ENABLED: toBool(env.BACKUP_ENABLED, true),
    BASELINE_ATTEMPTS: toNumber(env.BASELINE_ATTEMPTS, 3),
    BASELINE_RETRY_MS: toNumber(env.BASELINE_RETRY_MS, 5000),
    TIMEZONE: toString(env.TIMEZONE, 'Asia/Taipei'),

    // Commandes HTTP
    HTTP_ENABLED: toBool(env.HTTP_ENABLED, true),
    HTTP_PORT: toNumber(env.HTTP_PORT, 3000),
    HISTORY_LIMIT: toNumber(env.HISTORY_LIMIT, 50),
    SUMMARY_PER_SOURCE: toNumber(env.SUMMARY_PER_SOURCE, 10),
  };
}

export const CONFIG: Readonly<AppConfig> = Object.freeze(loadConfig());

// Validation de la configuration
export function validateConfig(config: AppConfig = CONFIG): { isValid: boolean; errors: string[]; warnings: string[] } {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.POLL_INTERVAL_MS <= 0) {
    errors.push('POLL_INTERVAL_MS doit être > 0');
  }

  if (config.HTTP_TIMEOUT_MS <= 0) {
    errors.push('HTTP_TIMEOUT_MS doit être > 0');
  }

  if (config.HTTP_TIMEOUT_MS >= config.POLL_INTERVAL_MS) {
    warnings.push('HTTP_TIMEOUT_MS >= POLL_INTERVAL_MS - les cycles lents seront coalescés');
  }

  if (config.BASELINE_ATTEMPTS < 1 || config.BASELINE_RETRY_MS < 0) {
    errors.push('BASELINE_ATTEMPTS doit être >= 1 et BASELINE_RETRY_MS >= 0');
  }

  if (!IANAZone.isValidZone(config.TIMEZONE)) {
    errors.push(`TIMEZONE invalide: ${config.TIMEZONE}`);
  }

  if (config.TELEGRAM_ENABLED && (!config.TELEGRAM_BOT_TOKEN || !config.TELEGRAM_CHAT_ID)) {
    errors.push('TELEGRAM_ENABLED=true mais configuration Telegram manquante');
  }

  if (!config.TELEGRAM_ENABLED) {
    warnings.push('Telegram désactivé - notifications en console uniquement');
  }

  if (config.HISTORY_LIMIT <= 0 || config.SUMMARY_PER_SOURCE <= 0) {
    errors.push('HISTORY_LIMIT et SUMMARY_PER_SOURCE doivent être > 0');
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings
  };
}

// Résumé de la configuration (sans secrets)
export function getConfigSummary(config: AppConfig = CONFIG): Record<string, string | number | boolean> {
  return {
    NODE_ENV: config.NODE_ENV,
    LOG_LEVEL: config.LOG_LEVEL,
    TELEGRAM_ENABLED: config.TELEGRAM_ENABLED,
    POLL_INTERVAL_MS: config.POLL_INTERVAL_MS,
    HTTP_TIMEOUT_MS: config.HTTP_TIMEOUT_MS,
    RECORD_FILE: config.RECORD_FILE,
    BACKUP_ENABLED: config.BACKUP_ENABLED,
    BASELINE_ATTEMPTS: config.BASELINE_ATTEMPTS,
    TIMEZONE: config.TIMEZONE,
    HTTP_ENABLED: config.HTTP_ENABLED,
    HTTP_PORT: config.HTTP_PORT,
  };
}

export function logConfigSummary(config: AppConfig = CONFIG): void {
  logger.child('config').info('🔧 Configuration du moniteur', getConfigSummary(config));
}
