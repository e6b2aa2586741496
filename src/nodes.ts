import { SearchPredicate, classify } from "./predicate.js";
import { AllRegions, AllRegionsMask, MinDataSize, Quadrants, RegionCode, quadrantsOf } from "./region-code.js";

/** Structural summary of a tree, as computed by QuadNode.accumulateStats */
export interface TreeStats {
	nodeCount: number;
	leafCount: number;
	/** Levels from the root (1) to the deepest leaf; 0 for an absent root */
	depth: number;
	/** Distinct values in the tree */
	valueCount: number;
	/** Values held on internal nodes because they fit none of the children */
	orphanCount: number;
}

/**
 * A node of the search tree.  Either a leaf holding values, or an internal node owning up to four children
 * (one per RegionCode).  An internal node's own value set is normally empty; it only holds orphans - values
 * that fit none of its children.
 */
export class QuadNode<TValue, TRegion> {
	private readonly _children: Quadrants<QuadNode<TValue, TRegion> | undefined> = quadrantsOf(() => undefined);
	private readonly _values = new Set<TValue>();

	constructor(
		private _predicate: SearchPredicate<TValue, TRegion> | undefined,
		private _region: TRegion,
	) { }

	/** Creates an empty node whose region is the predicate's nil region */
	static create<TValue, TRegion>(predicate: SearchPredicate<TValue, TRegion>): QuadNode<TValue, TRegion> {
		return new QuadNode(predicate, predicate.nilCompare());
	}

	/** This node's search space */
	get region(): TRegion {
		return this._region;
	}

	/** Values held directly by this node (orphans, if this node has children) */
	get values(): ReadonlySet<TValue> {
		return this._values;
	}

	/** @returns the child for the given quadrant, if materialized */
	child(code: RegionCode): QuadNode<TValue, TRegion> | undefined {
		return this._children[code];
	}

	hasChildren(): boolean {
		return AllRegions.some(code => this._children[code] !== undefined);
	}

	/** Sets the predicate for this node and all descendants */
	setPredicate(predicate: SearchPredicate<TValue, TRegion> | undefined) {
		this._predicate = predicate;
		for (const child of this.childNodes()) {
			child.setPredicate(predicate);
		}
	}

	/** Adds the value to every child that satisfies it.  If none do (or there are no children), the value is kept here. */
	add(value: TValue) {
		const predicate = this._predicate;
		if (!predicate) {
			return;
		}

		let wasAdded = false;
		for (const child of this.childNodes()) {
			if (predicate.satisfies(child._region, value)) {
				child.add(value);
				wasAdded = true;
			}
		}

		if (!wasAdded) {	// Leaf, or an orphan that a later rebalance should relocate
			this._values.add(value);
		}
	}

	/** Removes the value from this node and every descendant.  No routing - pruning every subtree is always safe. */
	remove(value: TValue) {
		for (const child of this.childNodes()) {
			child.remove(value);
		}
		this._values.delete(value);
	}

	/** Drops all children and values */
	clear() {
		this.deleteChildren();
		this._values.clear();
	}

	/** @returns values held by any node whose region overlaps the query (including orphans on internal nodes) */
	getNearbyValues(query: TRegion): Set<TValue> {
		const found = new Set<TValue>();
		this.collectNearby(query, found);
		return found;
	}

	/** @returns every value held by this node and its descendants */
	allValues(): Set<TValue> {
		const found = new Set<TValue>();
		this.collectAll(found);
		return found;
	}

	/** @returns true if the value is held anywhere in this subtree */
	has(value: TValue): boolean {
		return this._values.has(value) || this.childNodes().some(child => child.has(value));
	}

	/** Recomputes this node's region from all of its data.  Only meaningful for the root. */
	buildRootRegion() {
		if (this._predicate) {
			this._region = this._predicate.buildRegionFromData(this.allValues());
		}
	}

	/**
	 * Reshapes this subtree top-down: decides whether this node should be a leaf or have four children,
	 * routes the data accordingly, then recurses into the children.
	 * Values that no longer satisfy this node's own region are kept here as orphans rather than dropped.
	 */
	rebalance() {
		const predicate = this._predicate;
		if (!predicate) {
			return;
		}

		const allData = this.allValues();
		const rejected: TValue[] = [];
		for (const value of allData) {
			if (!predicate.satisfies(this._region, value)) {
				allData.delete(value);
				rejected.push(value);
			}
		}

		this._values.clear();

		if (allData.size <= MinDataSize) {
			this.becomeLeaf(allData);
		} else {
			const previous = this.hasChildren() ? this.childRegions(predicate) : undefined;
			const quadrants = predicate.buildQuadrantsFromData(this._region, allData, previous);
			if (this.shouldSubdivide(predicate, allData, quadrants)) {
				this.subdivide(predicate, allData, quadrants);
			} else {
				this.becomeLeaf(allData);
			}
		}

		for (const value of rejected) {
			this._values.add(value);
		}
	}

	/** @returns a deep copy of this subtree, sharing the predicate */
	clone(): QuadNode<TValue, TRegion> {
		const copy = new QuadNode<TValue, TRegion>(this._predicate, this._region);
		for (const value of this._values) {
			copy._values.add(value);
		}
		for (const code of AllRegions) {
			copy._children[code] = this._children[code]?.clone();
		}
		return copy;
	}

	/** Adds this subtree's structure to the given stats.  valueCount is left to the caller, since values may repeat across leaves. */
	accumulateStats(stats: TreeStats, depth = 1) {
		++stats.nodeCount;
		stats.depth = Math.max(stats.depth, depth);
		const children = this.childNodes();
		if (children.length === 0) {
			++stats.leafCount;
		} else {
			stats.orphanCount += this._values.size;
			for (const child of children) {
				child.accumulateStats(stats, depth + 1);
			}
		}
	}

	private becomeLeaf(data: Set<TValue>) {
		this.deleteChildren();
		for (const value of data) {
			this._values.add(value);
		}
	}

	private subdivide(predicate: SearchPredicate<TValue, TRegion>, data: Set<TValue>, quadrants: Quadrants<TRegion>) {
		for (const code of AllRegions) {
			const child = this._children[code] ?? QuadNode.create(predicate);
			child.emptyValues();	// Data was gathered above; re-routed below
			child._region = quadrants[code];
			this._children[code] = child;
		}

		for (const value of data) {
			this.add(value);	// May leave orphans on this node
		}

		for (const child of this.childNodes()) {
			child.rebalance();
		}
	}

	/** Subdivide only if some value misses at least one quadrant; otherwise all four children would hold the same data. */
	private shouldSubdivide(predicate: SearchPredicate<TValue, TRegion>, data: Set<TValue>, quadrants: Quadrants<TRegion>): boolean {
		for (const value of data) {
			if (classify(predicate, quadrants, value) !== AllRegionsMask) {
				return true;
			}
		}
		return false;
	}

	/** Clears values throughout the subtree, keeping its structure */
	private emptyValues() {
		this._values.clear();
		for (const child of this.childNodes()) {
			child.emptyValues();
		}
	}

	private deleteChildren() {
		for (const code of AllRegions) {
			this._children[code] = undefined;
		}
	}

	private childRegions(predicate: SearchPredicate<TValue, TRegion>): Quadrants<TRegion> {
		return quadrantsOf(code => this._children[code]?._region ?? predicate.nilCompare());
	}

	private childNodes(): QuadNode<TValue, TRegion>[] {
		const result: QuadNode<TValue, TRegion>[] = [];
		for (const code of AllRegions) {
			const child = this._children[code];
			if (child) {
				result.push(child);
			}
		}
		return result;
	}

	private collectNearby(query: TRegion, found: Set<TValue>) {
		for (const child of this.childNodes()) {
			child.collectNearby(query, found);
		}
		if (this._predicate && this._predicate.overlaps(this._region, query)) {
			for (const value of this._values) {
				found.add(value);
			}
		}
	}

	private collectAll(found: Set<TValue>) {
		for (const child of this.childNodes()) {
			child.collectAll(found);
		}
		for (const value of this._values) {
			found.add(value);
		}
	}
}
