import { QuadNode, Rect, RectPredicate, RectPredicateOptions, RegionCode, SearchTree, rect } from '../src/index.js';

/** A named value whose bounds may move between rebalances */
export class Box {
	constructor(
		public readonly name: string,
		public bounds: Rect,
	) { }
}

export const World = rect(0, 0, 100, 100);

export function box(name: string, x: number, y: number, width: number, height: number): Box {
	return new Box(name, rect(x, y, width, height));
}

export function boxPredicate(options: RectPredicateOptions = { world: World }): RectPredicate<Box> {
	return new RectPredicate<Box>(b => b.bounds, options);
}

/** 12 disjoint boxes on a 4 x 3 grid, spaced apart so no two share an edge */
export function gridBoxes(): Box[] {
	const boxes: Box[] = [];
	for (let i = 0; i < 12; i++) {
		boxes.push(box(`g${i}`, 5 + (i % 4) * 24, 5 + Math.floor(i / 4) * 30, 6, 6));
	}
	return boxes;
}

/** One box centered in each quadrant of World */
export function quadrantBoxes(): Record<'ul' | 'ur' | 'll' | 'lr', Box> {
	return {
		ul: box('ul', 20, 20, 10, 10),
		ur: box('ur', 70, 20, 10, 10),
		ll: box('ll', 20, 70, 10, 10),
		lr: box('lr', 70, 70, 10, 10),
	};
}

export function names(values: Iterable<Box>): string[] {
	return [...values].map(b => b.name).sort();
}

export function rootOf<TValue, TRegion>(tree: SearchTree<TValue, TRegion>): QuadNode<TValue, TRegion> {
	const root = tree.root;
	if (!root) {
		throw new Error('Tree has no root');
	}
	return root;
}

export function childOf<TValue, TRegion>(node: QuadNode<TValue, TRegion>, code: RegionCode): QuadNode<TValue, TRegion> {
	const child = node.child(code);
	if (!child) {
		throw new Error(`No child for region ${RegionCode[code]}`);
	}
	return child;
}
