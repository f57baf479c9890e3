/**
 * Poll Utilities
 *
 * One polling loop for every remote job: fetch the status, classify it,
 * stop on a terminal state or when the attempt budget runs out.
 * Transient network failures are logged and polled through.
 */

import axios from 'axios';
import { JobFailedError, PollTimeoutError, UpstreamError } from '../../domain/errors';

/**
 * What a single status response means for the loop.
 */
export type PollOutcome<TResult> =
    | { state: 'pending'; status: string }
    | { state: 'completed'; value: TResult }
    | { state: 'failed'; reason: string };

export interface PollOptions<TStatus, TResult> {
    /** Remote job identifier, reported on failure and timeout */
    jobId: string;
    /** Delay between two status requests */
    intervalMs: number;
    /** Maximum number of status requests */
    maxAttempts: number;
    fetchStatus: () => Promise<TStatus>;
    classify: (status: TStatus) => PollOutcome<TResult>;
    /** Errors for which polling continues (default: network errors, 429 and 5xx) */
    isTransient?: (error: unknown) => boolean;
    /** Where the job can be checked by hand once we give up */
    checkUrl?: string;
    /** Log prefix */
    label?: string;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Polls until the job completes, fails, or the budget is exhausted.
 *
 * @returns the value carried by the `completed` outcome
 * @throws JobFailedError when the job reports failure
 * @throws PollTimeoutError when no terminal state is seen in `maxAttempts` polls
 */
export async function pollUntilTerminal<TStatus, TResult>(
    options: PollOptions<TStatus, TResult>
): Promise<TResult> {
    const isTransient = options.isTransient ?? isTransientHttpError;
    const wait = options.sleep ?? sleep;
    const label = options.label ?? 'Poll';

    for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
        let status: TStatus;
        try {
            status = await options.fetchStatus();
        } catch (error) {
            if (!isTransient(error)) {
                throw error;
            }
            const reason = error instanceof Error ? error.message : String(error);
            console.warn(`[${label}] Status check failed (attempt ${attempt}/${options.maxAttempts}), will retry: ${reason}`);
            if (attempt < options.maxAttempts) {
                await wait(options.intervalMs);
            }
            continue;
        }

        const outcome = options.classify(status);
        if (outcome.state === 'completed') {
            return outcome.value;
        }
        if (outcome.state === 'failed') {
            throw new JobFailedError(options.jobId, outcome.reason);
        }

        console.error(`[${label}] Polling attempt ${attempt}/${options.maxAttempts}: status = ${outcome.status}`);
        if (attempt < options.maxAttempts) {
            await wait(options.intervalMs);
        }
    }

    throw new PollTimeoutError(
        options.jobId,
        elapsedMinutes(options.maxAttempts, options.intervalMs),
        options.checkUrl
    );
}

/**
 * Minutes covered by a polling budget, rounded to one decimal.
 */
export function elapsedMinutes(maxAttempts: number, intervalMs: number): number {
    return Math.round((maxAttempts * intervalMs) / 6000) / 10;
}

/**
 * Check if an HTTP error is worth polling through based on status code.
 */
export function isTransientHttpError(error: unknown): boolean {
    if (error instanceof UpstreamError) {
        return isTransientStatus(error.statusCode);
    }
    if (axios.isAxiosError(error)) {
        return isTransientStatus(error.response?.status);
    }
    return false;
}

function isTransientStatus(status: number | undefined): boolean {
    // No response at all: timeout, reset, DNS
    if (status === undefined) {
        return true;
    }
    return status === 429 || (status >= 500 && status < 600);
}

/**
 * Helper to sleep for a specified duration.
 */
export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
