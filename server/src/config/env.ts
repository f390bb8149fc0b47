import { z } from 'zod';
import dotenv from 'dotenv';
import { existsSync } from 'fs';
import { resolve } from 'path';
import { logLevelSchema } from './logger.js';

// Load .env from the working directory first, then from the repository root
const possiblePaths = [
  resolve(process.cwd(), '.env'),
  resolve(__dirname, '../../../.env'),
];

let envLoaded = false;
for (const envPath of possiblePaths) {
  if (existsSync(envPath)) {
    const result = dotenv.config({ path: envPath });
    if (result.error) {
      console.log(`Failed to load ${envPath}:`, result.error.message);
    } else {
      console.log(`✓ Loaded environment from: ${envPath}`);
      envLoaded = true;
      break;
    }
  }
}

if (!envLoaded) {
  console.log('No .env file found - using process environment variables only');
}

const decimal = /^\d+(\.\d+)?$/;

const envSchema = z.object({
  // Runtime
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().regex(/^\d+$/).transform(Number).default('8000'),
  LOG_LEVEL: logLevelSchema,

  // Storage
  DATABASE_PATH: z.string().min(1).default('./data/donations.db'),
  SEED_DEMO_DATA: z.enum(['true', 'false']).transform((v) => v === 'true').default('false'),

  // Payment network
  NETWORK: z.string().min(1).default('base-sepolia'),

  // HTTP
  ALLOWED_ORIGINS: z
    .string()
    .default('http://localhost:3000,http://localhost:8000')
    .transform((value) => value.split(',').map((origin) => origin.trim()).filter(Boolean)),

  // Donation limits
  MIN_DONATION_USD: z.string().regex(decimal).transform(Number).default('0.01'),
  MAX_DONATION_USD: z.string().regex(decimal).transform(Number).default('1000'),
  MAX_MESSAGE_LENGTH: z.string().regex(/^\d+$/).transform(Number).default('200'),
  TIER_MATCH_TOLERANCE: z.string().regex(decimal).transform(Number).default('0.01'),
}).refine(
  (data) => data.MAX_DONATION_USD >= data.MIN_DONATION_USD,
  {
    message: 'MAX_DONATION_USD must be greater than or equal to MIN_DONATION_USD',
    path: ['MAX_DONATION_USD'],
  }
);

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

export function validateEnv(): Env {
  if (cachedEnv) {
    return cachedEnv;
  }

  try {
    cachedEnv = envSchema.parse(process.env);
    console.log('✓ Environment validation successful');
    return cachedEnv;
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('\n❌ Environment validation failed:');
      error.errors.forEach((err) => {
        const varName = err.path.join('.');
        console.error(`  - ${varName}: ${err.message}`);
      });
      console.error('\nExpected configuration (all optional):');
      console.error('  - PORT, NODE_ENV, LOG_LEVEL');
      console.error('  - DATABASE_PATH, SEED_DEMO_DATA=true|false');
      console.error('  - NETWORK, ALLOWED_ORIGINS (comma separated)');
      console.error('  - MIN_DONATION_USD, MAX_DONATION_USD, MAX_MESSAGE_LENGTH, TIER_MATCH_TOLERANCE\n');
      process.exit(1);
    }
    throw error;
  }
}

export const env = validateEnv();
