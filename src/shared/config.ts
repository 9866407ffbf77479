import cron from 'node-cron';
import { logger } from './logger.js';

export interface DigestConfig {
  // Scheduling
  schedules: string[]; // cron expressions (server time)
  runOnStart: boolean;

  // Completion API
  apiKey?: string;
  baseUrl: string;
  model: string;
  maxTokens: number;
  temperature: number;

  // Timeouts
  requestTimeoutMs: number;
  connectionTimeoutMs: number;
  imageProbeTimeoutMs: number;

  // Features
  enableValidation: boolean;
}

export const DEFAULT_CONFIG: DigestConfig = {
  schedules: ['0 8 * * *'], // 8am daily

  runOnStart: false,

  baseUrl: 'https://api.perplexity.ai/chat/completions',
  model: 'sonar-pro',
  maxTokens: 350,
  temperature: 0.3,

  requestTimeoutMs: 35000,
  connectionTimeoutMs: 20000,
  imageProbeTimeoutMs: 10000,

  enableValidation: true
};

function envSchedules(): string[] | undefined {
  const raw = process.env.DIGEST_SCHEDULES;
  if (!raw) return undefined;
  const schedules = raw.split(',').map(s => s.trim()).filter(Boolean);
  return schedules.length > 0 ? schedules : undefined;
}

export class Config {
  private config: DigestConfig;

  constructor(overrides: Partial<DigestConfig> = {}) {
    this.config = {
      ...DEFAULT_CONFIG,
      // Environment first, explicit overrides win
      apiKey: process.env.PERPLEXITY_API_KEY,
      baseUrl: process.env.PERPLEXITY_BASE_URL || DEFAULT_CONFIG.baseUrl,
      model: process.env.PERPLEXITY_MODEL || DEFAULT_CONFIG.model,
      schedules: envSchedules() ?? DEFAULT_CONFIG.schedules,
      ...overrides
    };

    this.validateConfig();
  }

  get<K extends keyof DigestConfig>(key: K): DigestConfig[K] {
    return this.config[key];
  }

  set<K extends keyof DigestConfig>(key: K, value: DigestConfig[K]) {
    logger.warn(`Config updated: ${key} = ${key === 'apiKey' ? '***' : String(value)}`);
    this.config[key] = value;
    this.validateConfig();
  }

  getAll(): DigestConfig {
    return { ...this.config };
  }

  private validateConfig() {
    if (!this.config.apiKey) {
      logger.warn('Missing required config: apiKey (PERPLEXITY_API_KEY)');
    }

    if (this.config.maxTokens < 1 || this.config.maxTokens > 4000) {
      throw new Error('maxTokens must be between 1 and 4000');
    }

    if (this.config.temperature < 0 || this.config.temperature > 2) {
      throw new Error('temperature must be between 0 and 2');
    }

    const timeouts = ['requestTimeoutMs', 'connectionTimeoutMs', 'imageProbeTimeoutMs'] as const;
    for (const key of timeouts) {
      if (!(this.config[key] > 0)) {
        throw new Error(`${key} must be a positive number of milliseconds`);
      }
    }

    if (this.config.schedules.length === 0) {
      throw new Error('At least one schedule must be defined');
    }

    for (const expression of this.config.schedules) {
      if (!cron.validate(expression)) {
        throw new Error(`Invalid cron expression: ${expression}`);
      }
    }

    logger.debug('Config validated successfully');
  }

  logConfig() {
    const safe = { ...this.config };
    if (safe.apiKey) safe.apiKey = '***';

    logger.info('Current config:', safe);
  }
}

export const config = new Config();
