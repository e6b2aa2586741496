import PQueue from "p-queue";
import { Logger } from "./logger.js";
import { SearchTree } from "./search-tree.js";

/**
 * Runs a tree's rebalance off the caller's current phase (e.g. behind a render).
 * At most one pass is in flight; a pass always runs to completion.
 * The tree has no internal synchronization, so callers must `await wait()` before the next round of
 * mutations or queries.
 */
export class RebalanceScheduler<TValue, TRegion> {
	private readonly queue = new PQueue({ concurrency: 1 });
	private queued: Promise<void> | undefined;
	private failure: { error: unknown } | undefined;

	constructor(
		private readonly tree: SearchTree<TValue, TRegion>,
	) { }

	/** True while a pass is queued or running */
	get isBusy(): boolean {
		return this.queue.size > 0 || this.queue.pending > 0;
	}

	/**
	 * Queues a rebalance pass.  If a pass is already waiting to start, that pass's promise is returned instead.
	 * @returns promise that settles when the pass completes; rejects with the predicate's error if the pass fails.
	 * The same error is also held for the next {@link wait}, so the returned promise may be dropped.
	 */
	schedule(): Promise<void> {
		if (this.queued) {
			return this.queued;
		}
		const pass = this.queue.add(async () => {
			await yieldToEventLoop();
			this.queued = undefined;	// Started - a later schedule() gets its own pass
			this.runPass();
		});
		pass.catch(() => undefined);	// Reported by wait()
		this.queued = pass;
		return pass;
	}

	/**
	 * Barrier: resolves once no pass is queued or running.
	 * Rejects with the first error thrown by a pass since the previous wait(), then forgets it.
	 */
	async wait(): Promise<void> {
		await this.queue.onIdle();
		const failure = this.failure;
		this.failure = undefined;
		if (failure) {
			throw failure.error;
		}
	}

	private runPass() {
		try {
			this.tree.rebalance();
		} catch (error) {
			Logger.error("Rebalance failed", error);
			this.failure ??= { error };
			throw error;
		}
	}
}

function yieldToEventLoop(): Promise<void> {
	return new Promise(resolve => setImmediate(resolve));
}
