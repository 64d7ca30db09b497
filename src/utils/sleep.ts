import { setTimeout as delay } from 'node:timers/promises';

/** Politeness pause. Rejects with an AbortError when the signal fires. */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0) {
        signal?.throwIfAborted();
        return;
    }
    await delay(ms, undefined, { signal });
}
