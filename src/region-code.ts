/** Quadrant identifiers.  Bit flags rather than an exclusive enum, since a value may belong to more than one quadrant. */
export enum RegionCode {
	UpperLeft = 1 << 0,
	UpperRight = 1 << 1,
	LowerLeft = 1 << 2,
	LowerRight = 1 << 3,
}

/** The four quadrants, in fixed iteration order */
export const AllRegions: readonly RegionCode[] = [
	RegionCode.UpperLeft,
	RegionCode.UpperRight,
	RegionCode.LowerLeft,
	RegionCode.LowerRight,
];

/** Mask with every quadrant bit set */
export const AllRegionsMask = RegionCode.UpperLeft | RegionCode.UpperRight | RegionCode.LowerLeft | RegionCode.LowerRight;

/** Minimum data size that warrants children.  Not configurable - a node at or below this count is always a leaf */
export const MinDataSize = 3;

/** One T per quadrant */
export type Quadrants<T> = Record<RegionCode, T>;

/** Builds a quadrant record by invoking the given factory for each code. */
export function quadrantsOf<T>(make: (code: RegionCode) => T): Quadrants<T> {
	return {
		[RegionCode.UpperLeft]: make(RegionCode.UpperLeft),
		[RegionCode.UpperRight]: make(RegionCode.UpperRight),
		[RegionCode.LowerLeft]: make(RegionCode.LowerLeft),
		[RegionCode.LowerRight]: make(RegionCode.LowerRight),
	};
}
