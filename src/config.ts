import dotenv from 'dotenv';
import path from 'node:path';

dotenv.config();

const parseBool = (input: string | undefined, fallback = false): boolean => {
  if (input === undefined) return fallback;
  return ['1', 'true', 'yes', 'on'].includes(input.toLowerCase());
};

const parseNumber = (input: string | undefined, fallback: number): number => {
  if (input === undefined) return fallback;
  const n = Number(input);
  return Number.isFinite(n) ? n : fallback;
};

export const config = {
  app: {
    name: 'governance-ledger-api',
    env: process.env.NODE_ENV ?? 'development',
    port: parseNumber(process.env.PORT, 8787),
  },
  paths: {
    stateFile: process.env.STATE_FILE ?? path.resolve(process.cwd(), 'data', 'ledger.json'),
    logFile: process.env.LOG_FILE ?? path.resolve(process.cwd(), 'data', 'events.ndjson'),
  },
  ledger: {
    // Deployer identity; only used when no state file exists yet.
    adminAddress: process.env.LEDGER_ADMIN_ADDRESS ?? '0x00000000000000000000000000000000000000a1',
  },
  ws: {
    enabled: parseBool(process.env.WS_ENABLED, true),
  },
};

export type AppConfig = typeof config;
