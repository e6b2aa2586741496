import { AllRegions, Quadrants } from "./region-code.js";

/**
 * Supplies every geometry operation the tree needs.  The tree itself never inspects a region.
 * Implementations should be pure: the same inputs always produce the same results.
 * @template TValue The type of values stored in the tree.
 * @template TRegion The search-space descriptor of a node (e.g. a rectangle).
 */
export interface SearchPredicate<TValue, TRegion> {
	/** @returns the "empty" region given to newly created nodes */
	nilCompare(): TRegion;

	/** Builds the root search space from the tree's complete current membership. */
	buildRegionFromData(values: ReadonlySet<TValue>): TRegion;

	/**
	 * Subdivides a parent's search space into four quadrants.
	 * @param previous the current regions of the parent's children, if it has any.  Never mutate it - return fresh regions.
	 * @returns a new region for each quadrant
	 */
	buildQuadrantsFromData(parentRegion: TRegion, values: ReadonlySet<TValue>, previous?: Readonly<Quadrants<TRegion>>): Quadrants<TRegion>;

	/** @returns true if the value belongs to the given search space */
	satisfies(region: TRegion, value: TValue): boolean;

	/** Must be symmetric: overlaps(a, b) === overlaps(b, a) */
	overlaps(a: TRegion, b: TRegion): boolean;
}

/** @returns bit mask (see RegionCode) of the quadrants that the value satisfies */
export function classify<TValue, TRegion>(
	predicate: SearchPredicate<TValue, TRegion>,
	quadrants: Readonly<Quadrants<TRegion>>,
	value: TValue,
): number {
	let mask = 0;
	for (const code of AllRegions) {
		if (predicate.satisfies(quadrants[code], value)) {
			mask |= code;
		}
	}
	return mask;
}
