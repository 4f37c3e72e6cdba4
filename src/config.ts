/**
 * Configuration management for Tick MCP Server
 */

import 'dotenv/config';
import { ConfigurationError } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type TransportKind = 'stdio' | 'http';

/** 0 = Sunday ... 6 = Saturday, as returned by Date#getDay */
export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6;

export interface Config {
  server: {
    transport: TransportKind;
    port: number;
    host: string;
  };
  tick: {
    apiToken: string;
    subdomain: string;
    apiBaseUrl: string;
    userAgent: string;
    requestTimeoutMs: number;
    pageSize: number;
  };
  reporting: {
    teamWindowDays: number;
    weekStartsOn: Weekday;
  };
  security: {
    allowedOrigins: string[];
  };
  rateLimit: {
    windowMs: number;
    maxRequests: number;
  };
  logging: {
    level: LogLevel;
  };
}

type Env = Record<string, string | undefined>;

const WEEKDAYS: Record<string, Weekday> = {
  sunday: 0,
  monday: 1,
  tuesday: 2,
  wednesday: 3,
  thursday: 4,
  friday: 5,
  saturday: 6,
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const TRANSPORTS: readonly TransportKind[] = ['stdio', 'http'];

function getEnvOrThrow(env: Env, key: string): string {
  const value = env[key]?.trim();
  if (!value) {
    throw new ConfigurationError(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvOrDefault(env: Env, key: string, defaultValue: string): string {
  return env[key]?.trim() || defaultValue;
}

function getPositiveInt(env: Env, key: string, defaultValue: number): number {
  const raw = getEnvOrDefault(env, key, String(defaultValue));
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${key} must be a positive integer, got '${raw}'`);
  }
  return value;
}

function getOneOf<T extends string>(env: Env, key: string, allowed: readonly T[], defaultValue: T): T {
  const raw = getEnvOrDefault(env, key, defaultValue).toLowerCase();
  const match = allowed.find((candidate) => candidate === raw);
  if (!match) {
    throw new ConfigurationError(`${key} must be one of ${allowed.join(', ')}, got '${raw}'`);
  }
  return match;
}

function getWeekday(env: Env, key: string): Weekday {
  const raw = getEnvOrDefault(env, key, 'monday').toLowerCase();
  const day = WEEKDAYS[raw];
  if (day === undefined) {
    throw new ConfigurationError(`${key} must be a weekday name, got '${raw}'`);
  }
  return day;
}

/**
 * Build the configuration from the environment.
 * Throws ConfigurationError when credentials are missing or a value is malformed.
 */
export function loadConfig(env: Env = process.env): Config {
  const subdomain = getEnvOrThrow(env, 'TICK_SUBDOMAIN');
  if (!/^[a-z0-9][a-z0-9-]*$/i.test(subdomain)) {
    throw new ConfigurationError(`TICK_SUBDOMAIN is not a valid subdomain: '${subdomain}'`);
  }

  return {
    server: {
      transport: getOneOf(env, 'MCP_TRANSPORT', TRANSPORTS, 'stdio'),
      port: getPositiveInt(env, 'PORT', 3000),
      host: getEnvOrDefault(env, 'HOST', 'localhost'),
    },
    tick: {
      apiToken: getEnvOrThrow(env, 'TICK_API_TOKEN'),
      subdomain,
      apiBaseUrl: `https://${subdomain}.tickspot.com/api/v2`,
      userAgent: getEnvOrDefault(env, 'TICK_USER_AGENT', 'TickMCP/0.1.0'),
      requestTimeoutMs: getPositiveInt(env, 'TICK_REQUEST_TIMEOUT_MS', 15000),
      pageSize: getPositiveInt(env, 'TICK_PAGE_SIZE', 100),
    },
    reporting: {
      teamWindowDays: getPositiveInt(env, 'TICK_TEAM_WINDOW_DAYS', 7),
      weekStartsOn: getWeekday(env, 'TICK_WEEK_START'),
    },
    security: {
      allowedOrigins: getEnvOrDefault(env, 'ALLOWED_ORIGINS', 'http://localhost:3000').split(','),
    },
    rateLimit: {
      windowMs: getPositiveInt(env, 'RATE_LIMIT_WINDOW_MS', 900000), // 15 minutes
      maxRequests: getPositiveInt(env, 'RATE_LIMIT_MAX', 1000),
    },
    logging: {
      level: getOneOf(env, 'LOG_LEVEL', LOG_LEVELS, 'info'),
    },
  };
}
