// src/core/workflow/timers.ts

import { setTimeout as wait } from 'timers/promises';
import { Sleeper } from './types';

/**
 * Waits `ms` milliseconds; rejects early with an AbortError if `signal` fires.
 */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
    wait(ms, undefined, { signal });

export const defaultSleeper: Sleeper = (ms) => sleep(ms);
