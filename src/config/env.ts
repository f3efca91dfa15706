// src/config/env.ts

import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';

// Load environment variables from project root, not process.cwd()
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

/**
 * Environment Variable Schema
 * Every tunable of the orchestrator is validated here once, at startup.
 */
const envSchema = z.object({
    // Server & Environment
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),

    // Durable state
    DATABASE_PATH: z.string().min(1).optional(),

    // One "time unit" of the retry and timeout contract, in milliseconds
    TIME_UNIT_MS: z.coerce.number().int().positive().default(1000),

    // Recovery loop period
    RECOVERY_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),

    // Step service simulation
    PREPARE_FAILURE_RATE: z.coerce.number().min(0).max(1).default(0.3),
    SIMULATED_LATENCY: z.enum(['true', 'false']).default('true').transform(val => val === 'true'),
});

// Process and validate
const _env = envSchema.parse(process.env);

if (_env.NODE_ENV === 'production' && _env.PREPARE_FAILURE_RATE > 0) {
    process.stderr.write('⚠️  WARNING: PREPARE_FAILURE_RATE is non-zero in production; preparation failures are being simulated.\n');
}

export type Env = z.infer<typeof envSchema>;

export const ENV: Env = _env;
