import { Logger } from "./logger.js";
import { QuadNode, TreeStats } from "./nodes.js";
import { SearchPredicate } from "./predicate.js";

/**
 * A generic 2D search tree.  Each node's search space is divided into four quadrants by the predicate,
 * and a value may belong to more than one quadrant.  The tree does no geometry itself.
 *
 * Mutations are cheap and never restructure; call rebalance() after values move (or after a batch of adds)
 * before relying on query results.
 * @template TValue The type of values stored.  Uniqueness is by Set identity.
 * @template TRegion The search-space descriptor produced and interpreted by the predicate.
 */
export class SearchTree<TValue, TRegion> {
	private _root: QuadNode<TValue, TRegion> | undefined;
	private _rebalancing = false;

	/**
	 * @param _predicate geometry strategy.  The tree does not operate without one, but it may be supplied later.
	 * 	The tree holds a reference only; the caller keeps it alive.
	 */
	constructor(
		private _predicate?: SearchPredicate<TValue, TRegion>,
	) { }

	get predicate(): SearchPredicate<TValue, TRegion> | undefined {
		return this._predicate;
	}

	/** The root node, created by the first add.  For inspection - mutate through the tree. */
	get root(): QuadNode<TValue, TRegion> | undefined {
		return this._root;
	}

	/** Computed (not stored) count of distinct values */
	get size(): number {
		return this._root ? this._root.allValues().size : 0;
	}

	/** Sets the predicate on the tree and every node.  Existing regions are not recomputed; rebalance if the geometry semantics changed. */
	setPredicate(predicate: SearchPredicate<TValue, TRegion> | undefined) {
		this.validateNotRebalancing();
		if (this._root && predicate !== this._predicate) {
			Logger.debug("Predicate replaced on a populated tree; regions are stale until the next rebalance");
		}
		this._predicate = predicate;
		this._root?.setPredicate(predicate);
	}

	/** Inserts a value.  No-op without a predicate.  May leave the tree unbalanced. */
	add(value: TValue) {
		this.validateNotRebalancing();
		if (!this._predicate) {
			return;
		}
		if (!this._root) {
			this._root = QuadNode.create(this._predicate);
		}
		this._root.add(value);
	}

	/** Removes a value.  Removing an absent value is a no-op. */
	remove(value: TValue) {
		this.validateNotRebalancing();
		this._root?.remove(value);
	}

	/** Empties the tree.  The (emptied) root remains. */
	clear() {
		this.validateNotRebalancing();
		this._root?.clear();
	}

	/** @returns all values belonging to nodes whose search space overlaps the query, as defined by the predicate */
	getNearbyValues(query: TRegion): Set<TValue> {
		return this._root ? this._root.getNearbyValues(query) : new Set<TValue>();
	}

	/** @returns every value in the tree */
	values(): Set<TValue> {
		return this._root ? this._root.allValues() : new Set<TValue>();
	}

	has(value: TValue): boolean {
		return this._root?.has(value) ?? false;
	}

	/**
	 * Rebuilds the root search space from the current data, then adds or removes nodes as necessary.
	 * Must be called after the positions of values change, as the tree does not detect this.
	 * WARNING: mutating the tree from within a predicate callback during a rebalance will throw.
	 */
	rebalance() {
		this.validateNotRebalancing();
		if (!this._root) {
			return;
		}

		this._rebalancing = true;
		try {
			this._root.buildRootRegion();
			this._root.rebalance();
		} finally {
			this._rebalancing = false;
		}

		if (Logger.isDebugEnabled()) {
			Logger.debug("Rebalanced", this.getStats());
		}
	}

	/** Computed (not stored) structural summary.  O(n) */
	getStats(): TreeStats {
		const stats: TreeStats = { nodeCount: 0, leafCount: 0, depth: 0, valueCount: 0, orphanCount: 0 };
		if (this._root) {
			this._root.accumulateStats(stats);
			stats.valueCount = this._root.allValues().size;
		}
		return stats;
	}

	/** @returns a deep copy of this tree.  The predicate is shared, not copied. */
	clone(): SearchTree<TValue, TRegion> {
		const copy = new SearchTree<TValue, TRegion>(this._predicate);
		copy._root = this._root?.clone();
		return copy;
	}

	/** Moves this tree's nodes into a new tree without copying.  This tree is left empty, with the same predicate. */
	transfer(): SearchTree<TValue, TRegion> {
		this.validateNotRebalancing();
		const target = new SearchTree<TValue, TRegion>(this._predicate);
		target._root = this._root;
		this._root = undefined;
		return target;
	}

	/** Exchanges the contents and predicates of two trees */
	swap(other: SearchTree<TValue, TRegion>) {
		this.validateNotRebalancing();
		other.validateNotRebalancing();
		[this._predicate, other._predicate] = [other._predicate, this._predicate];
		[this._root, other._root] = [other._root, this._root];
	}

	private validateNotRebalancing() {
		if (this._rebalancing) {
			throw new Error("Tree mutated during rebalance");
		}
	}
}
