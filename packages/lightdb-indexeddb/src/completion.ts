/**
 * Bridges IndexedDB's event notifications into promises.
 *
 * IndexedDB ends every request with exactly one of `success`/`error`, and every transaction
 * with one of `complete`/`abort` (an `error` bubbling from a failed request precedes the
 * abort). `settle` listens on all of a set of mutually exclusive events, settles on the first,
 * and detaches every listener it added, so a handler never runs twice and none is left behind.
 */

import { CancelledError } from './common/errors.js';

export interface SettleOptions {
	/** Rejects the wait with CancelledError once aborted. */
	signal?: AbortSignal;
	/** Milliseconds to wait before rejecting with CancelledError; 0 or unset waits forever. */
	timeoutMs?: number;
}

/**
 * Resolve with the first of `types` dispatched on `target`.
 *
 * Listeners are added with the plain two-argument form and removed the same way, which
 * every EventTarget implementation (including fake-indexeddb's) matches identically.
 */
export function settle(target: EventTarget, types: readonly string[], options: SettleOptions = {}): Promise<Event> {
	const { signal, timeoutMs } = options;

	return new Promise<Event>((resolve, reject) => {
		if (signal?.aborted) {
			reject(new CancelledError('Operation cancelled before it started', signal.reason));
			return;
		}

		let settled = false;
		let timer: ReturnType<typeof setTimeout> | undefined;

		const detach = (): void => {
			settled = true;
			for (const type of types) {
				target.removeEventListener(type, onEvent);
			}
			signal?.removeEventListener('abort', onAbort);
			if (timer !== undefined) {
				clearTimeout(timer);
			}
		};

		function onEvent(event: Event): void {
			if (settled) return;
			detach();
			resolve(event);
		}

		function onAbort(): void {
			if (settled) return;
			detach();
			reject(new CancelledError('Operation cancelled', signal?.reason));
		}

		for (const type of types) {
			target.addEventListener(type, onEvent);
		}
		signal?.addEventListener('abort', onAbort);
		if (timeoutMs) {
			timer = setTimeout(() => {
				if (settled) return;
				detach();
				reject(new CancelledError(`Timed out after ${timeoutMs}ms waiting for ${types.join('/')}`));
			}, timeoutMs);
		}
	});
}

/**
 * Wait for a request's `success` or `error`, whichever fires.
 * The request's own `error` field tells the two apart afterwards.
 */
export function settleRequest(request: IDBRequest, options?: SettleOptions): Promise<Event> {
	return settle(request, ['success', 'error'], options);
}

/**
 * The error carried by an event's target (a request or transaction), if any.
 */
export function eventTargetError(event: Event): Error | null {
	const target = event.target;
	if (target !== null && 'error' in target && target.error instanceof Error) {
		return target.error;
	}
	return null;
}
