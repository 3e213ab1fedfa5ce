import path from 'node:path';
import { z } from 'zod';
import './lib/env.js';
import { ConfigError } from './lib/errors.js';
import {
  CHAMBER_IMAGE_PORT,
  DEFAULT_MAX_FRAME_BYTES,
  PRINTER_USERNAME,
  RTSP_PORT,
} from './protocol/constants.js';
import type { AccessCredential } from './types.js';

const port = z.coerce.number().int().min(1).max(65535);

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .default('false')
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

export const envSchema = z
  .object({
    PRINTER_IP: z.string().trim().min(1, 'printer address is required'),
    ACCESS_CODE: z
      .string()
      .trim()
      .min(1, 'access code is required')
      .max(32)
      .regex(/^[\x21-\x7e]+$/, 'access code must be printable ASCII'),
    BIND_ADDRESS: z.string().trim().min(1).default('0.0.0.0'),
    CHAMBER_PORT: port.default(CHAMBER_IMAGE_PORT),
    RTSP_PORT: port.default(RTSP_PORT),
    STATUS_PORT: z.coerce.number().int().min(0).max(65535).default(8080),
    CORS_ORIGINS: z.string().default('*'),
    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),
    TLS_CERT_PATH: z.string().optional(),
    TLS_KEY_PATH: z.string().optional(),
    CERT_DIR: z.string().default('certs'),
    CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    UPSTREAM_ACCEPT_MS: z.coerce.number().int().positive().default(2_000),
    CLIENT_AUTH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    IDLE_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
    BACKOFF_MIN_MS: z.coerce.number().int().positive().default(1_000),
    BACKOFF_MAX_MS: z.coerce.number().int().positive().default(30_000),
    BACKOFF_JITTER: z.coerce.number().min(0).max(1).default(0.1),
    MAX_FRAME_BYTES: z.coerce.number().int().positive().default(DEFAULT_MAX_FRAME_BYTES),
    CLIENT_QUEUE_FRAMES: z.coerce.number().int().min(1).default(2),
    FTP_PROXY_ENABLED: flag,
  })
  .refine((env) => env.BACKOFF_MIN_MS <= env.BACKOFF_MAX_MS, {
    message: 'BACKOFF_MIN_MS must not exceed BACKOFF_MAX_MS',
    path: ['BACKOFF_MIN_MS'],
  })
  .refine((env) => Boolean(env.TLS_CERT_PATH) === Boolean(env.TLS_KEY_PATH), {
    message: 'TLS_CERT_PATH and TLS_KEY_PATH must be set together',
    path: ['TLS_CERT_PATH'],
  });

export interface BackoffConfig {
  minMs: number;
  maxMs: number;
  jitter: number;
}

export interface ProxyConfig {
  printerIp: string;
  credential: AccessCredential;
  bindAddress: string;
  chamberPort: number;
  rtspPort: number;
  statusPort: number;
  corsOrigins: string[] | '*';
  logLevel: string;
  tls: { certPath: string; keyPath: string } | { certDir: string };
  connectTimeoutMs: number;
  upstreamAcceptMs: number;
  clientAuthTimeoutMs: number;
  idleTimeoutMs: number;
  backoff: BackoffConfig;
  maxFrameBytes: number;
  clientQueueFrames: number;
  ftpProxyEnabled: boolean;
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): ProxyConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`),
    );
  }
  const parsed = result.data;
  const origins = parsed.CORS_ORIGINS.split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

  const config: ProxyConfig = {
    printerIp: parsed.PRINTER_IP,
    credential: Object.freeze({ username: PRINTER_USERNAME, accessCode: parsed.ACCESS_CODE }),
    bindAddress: parsed.BIND_ADDRESS,
    chamberPort: parsed.CHAMBER_PORT,
    rtspPort: parsed.RTSP_PORT,
    statusPort: parsed.STATUS_PORT,
    corsOrigins: origins.length === 0 || origins.includes('*') ? '*' : origins,
    logLevel: parsed.LOG_LEVEL,
    tls:
      parsed.TLS_CERT_PATH && parsed.TLS_KEY_PATH
        ? { certPath: parsed.TLS_CERT_PATH, keyPath: parsed.TLS_KEY_PATH }
        : { certDir: path.resolve(process.cwd(), parsed.CERT_DIR) },
    connectTimeoutMs: parsed.CONNECT_TIMEOUT_MS,
    upstreamAcceptMs: parsed.UPSTREAM_ACCEPT_MS,
    clientAuthTimeoutMs: parsed.CLIENT_AUTH_TIMEOUT_MS,
    idleTimeoutMs: parsed.IDLE_TIMEOUT_MS,
    backoff: {
      minMs: parsed.BACKOFF_MIN_MS,
      maxMs: parsed.BACKOFF_MAX_MS,
      jitter: parsed.BACKOFF_JITTER,
    },
    maxFrameBytes: parsed.MAX_FRAME_BYTES,
    clientQueueFrames: parsed.CLIENT_QUEUE_FRAMES,
    ftpProxyEnabled: parsed.FTP_PROXY_ENABLED,
  };
  return Object.freeze(config);
}
