import { z } from 'zod';
import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';

dotenv.config();

const ConfigSchema = z.object({
  probe: z.object({
    // Optional here: a missing secret id must fail the invocation, not process start.
    secretId: z.string().min(1).optional(),
    connectTimeoutMs: z.number().int().positive().default(5000),
  }),
  logStream: z.object({
    logGroupName: z.string().min(1).default('/aws/custom/aurora-connectivity'),
    streamPrefix: z.string().default('execution-'),
    retentionInDays: z.number().int().positive().default(7),
  }),
  aws: z.object({
    region: z.string().min(1).optional(),
  }),
  server: z.object({
    port: z.number().int().positive().default(3000),
  }),
  logging: z.object({
    level: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),
    json: z.boolean().default(true),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type LogStreamConfig = AppConfig['logStream'];

function envInt(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const n = Number(raw);
  return Number.isNaN(n) ? undefined : n;
}

function section(fileRaw: Record<string, unknown>, key: string): Record<string, unknown> {
  const parsed = z.record(z.unknown()).safeParse(fileRaw[key]);
  return parsed.success ? parsed.data : {};
}

export function loadConfig(configPath = 'probe.config.json'): AppConfig {
  const full = path.resolve(process.cwd(), configPath);
  let fileRaw: Record<string, unknown> = {};
  if (fs.existsSync(full)) {
    try {
      fileRaw = JSON.parse(fs.readFileSync(full, 'utf8'));
    } catch (e) {
      throw new Error(`Failed to parse config file ${full}: ${(e as Error).message}`);
    }
  }
  const merged = {
    probe: {
      secretId: process.env.DB_SECRET_NAME || undefined,
      connectTimeoutMs: envInt('PROBE_CONNECT_TIMEOUT_MS') ?? 5000,
      ...section(fileRaw, 'probe'),
    },
    logStream: {
      logGroupName: process.env.PROBE_LOG_GROUP || '/aws/custom/aurora-connectivity',
      streamPrefix: process.env.PROBE_LOG_STREAM_PREFIX ?? 'execution-',
      retentionInDays: envInt('PROBE_LOG_RETENTION_DAYS') ?? 7,
      ...section(fileRaw, 'logStream'),
    },
    aws: {
      region: process.env.AWS_REGION || undefined,
      ...section(fileRaw, 'aws'),
    },
    server: {
      port: envInt('PORT') ?? 3000,
      ...section(fileRaw, 'server'),
    },
    logging: {
      level: process.env.LOG_LEVEL || 'info',
      json: process.env.LOG_PRETTY !== '1',
      ...section(fileRaw, 'logging'),
    },
  };
  return ConfigSchema.parse(merged);
}
