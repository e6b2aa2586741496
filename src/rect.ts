import { SearchPredicate } from "./predicate.js";
import { Quadrants, RegionCode } from "./region-code.js";

/** Axis-aligned box in screen space: y grows downward, so "upper" quadrants have the smaller y. */
export interface Rect {
	minX: number;
	minY: number;
	maxX: number;
	maxY: number;
}

export interface RectPredicateOptions {
	/** If given, the root search space always covers at least this box */
	world?: Rect;
}

/** @returns a rect from position and size */
export function rect(x: number, y: number, width: number, height: number): Rect {
	if (![x, y, width, height].every(Number.isFinite)) {
		throw new RangeError(`Rect components must be finite (got ${x}, ${y}, ${width}, ${height})`);
	}
	if (width < 0 || height < 0) {
		throw new RangeError(`Rect size must not be negative (got ${width} x ${height})`);
	}
	return { minX: x, minY: y, maxX: x + width, maxY: y + height };
}

/** Checks if boxes intersect (borders inclusively) */
export function intersects(a: Rect, b: Rect): boolean {
	return a.minX <= b.maxX && b.minX <= a.maxX
		&& a.minY <= b.maxY && b.minY <= a.maxY;
}

export function union(a: Rect, b: Rect): Rect {
	return {
		minX: Math.min(a.minX, b.minX),
		minY: Math.min(a.minY, b.minY),
		maxX: Math.max(a.maxX, b.maxX),
		maxY: Math.max(a.maxY, b.maxY),
	};
}

export function center(r: Rect): [x: number, y: number] {
	return [(r.minX + r.maxX) / 2, (r.minY + r.maxY) / 2];
}

/**
 * Predicate over values with rectangular bounds.  Quadrants are equal halves of the parent on each axis;
 * a value belongs to every quadrant its bounds touch.
 *
 * More than MinDataSize values stacked on one spot (e.g. coincident zero-size bounds) that do not sit on a
 * split line keep discriminating, so the branch deepens until halving no longer changes the region in
 * floating point: about 50 levels inside a 100-unit world, and over a thousand at the origin.  Give such
 * values some extent, or offset them, if depth matters.
 */
export class RectPredicate<TValue> implements SearchPredicate<TValue, Rect> {
	/**
	 * @param boundsOf extracts the bounds of a value.  Read on every test, so values may move between rebalances.
	 */
	constructor(
		private readonly boundsOf: (value: TValue) => Rect,
		private readonly options: RectPredicateOptions = {},
	) { }

	/** Unit box at the origin */
	nilCompare(): Rect {
		return rect(0, 0, 1, 1);
	}

	buildRegionFromData(values: ReadonlySet<TValue>): Rect {
		let region = this.options.world;
		for (const value of values) {
			const bounds = this.boundsOf(value);
			region = region ? union(region, bounds) : { ...bounds };
		}
		return region ? { ...region } : this.nilCompare();
	}

	buildQuadrantsFromData(parent: Rect): Quadrants<Rect> {
		const [midX, midY] = center(parent);
		return {
			[RegionCode.UpperLeft]: { minX: parent.minX, minY: parent.minY, maxX: midX, maxY: midY },
			[RegionCode.UpperRight]: { minX: midX, minY: parent.minY, maxX: parent.maxX, maxY: midY },
			[RegionCode.LowerLeft]: { minX: parent.minX, minY: midY, maxX: midX, maxY: parent.maxY },
			[RegionCode.LowerRight]: { minX: midX, minY: midY, maxX: parent.maxX, maxY: parent.maxY },
		};
	}

	satisfies(region: Rect, value: TValue): boolean {
		return intersects(region, this.boundsOf(value));
	}

	overlaps(a: Rect, b: Rect): boolean {
		return intersects(a, b);
	}
}
