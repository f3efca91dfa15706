// src/config/config.ts

import path from 'path';
import { ENV } from './env';

/**
 * Project root, derived from this file's location so the data directory
 * does not move with the working directory of the process.
 */
const PROJECT_ROOT = path.resolve(__dirname, '../..');
const DATA_DIR = path.join(PROJECT_ROOT, 'data');

interface ServerConfig {
    NAME: string;
    VERSION: string;
}

interface PathsConfig {
    PROJECT_ROOT: string;
    DATA_DIR: string;
    DATABASE_FILE: string;
}

interface WorkflowConfig {
    ID_PREFIX: string;
    RECOVERY_INTERVAL_MS: number;
}

interface RetryConfig {
    MAXIMUM_ATTEMPTS: number;
    INITIAL_INTERVAL_UNITS: number;
    BACKOFF_COEFFICIENT: number;
    MAXIMUM_INTERVAL_UNITS: number;
}

interface TimeoutConfig {
    TIME_UNIT_MS: number;
    START_TO_CLOSE_UNITS: number;
}

interface ServicesConfig {
    PREPARE_FAILURE_RATE: number;
    SIMULATED_LATENCY: boolean;
    LATENCY_MS: {
        CHARGE: number;
        PREPARE: number;
        NOTIFY: number;
    };
}

interface CacheConfig {
    MAX_RESULTS: number;
    TTL_MS: number;
}

interface Config {
    SERVER: ServerConfig;
    PATHS: PathsConfig;
    WORKFLOW: WorkflowConfig;
    RETRY: RetryConfig;
    TIMEOUTS: TimeoutConfig;
    SERVICES: ServicesConfig;
    CACHE: CacheConfig;
}

/**
 * Centralized configuration for the order orchestrator.
 */
export const CONFIG: Config = {
    SERVER: {
        NAME: 'order-orchestrator',
        VERSION: '1.0.0',
    },

    PATHS: {
        PROJECT_ROOT,
        DATA_DIR,
        DATABASE_FILE: ENV.DATABASE_PATH
            ?? path.join(DATA_DIR, ENV.NODE_ENV === 'test' ? 'orders_test.db' : 'orders.db'),
    },

    WORKFLOW: {
        ID_PREFIX: 'order-',
        RECOVERY_INTERVAL_MS: ENV.RECOVERY_INTERVAL_MS,
    },

    // Delays of 1, 2, 4, 8 units before attempts 2..5
    RETRY: {
        MAXIMUM_ATTEMPTS: 5,
        INITIAL_INTERVAL_UNITS: 1,
        BACKOFF_COEFFICIENT: 2.0,
        MAXIMUM_INTERVAL_UNITS: 100,
    },

    TIMEOUTS: {
        TIME_UNIT_MS: ENV.TIME_UNIT_MS,
        START_TO_CLOSE_UNITS: 10,
    },

    SERVICES: {
        PREPARE_FAILURE_RATE: ENV.PREPARE_FAILURE_RATE,
        SIMULATED_LATENCY: ENV.SIMULATED_LATENCY,
        LATENCY_MS: {
            CHARGE: 500,
            PREPARE: 1000,
            NOTIFY: 300,
        },
    },

    CACHE: {
        MAX_RESULTS: 500,
        TTL_MS: 60 * 60 * 1000, // 1 hour
    },
};
