import { expect } from 'chai';
import { AllRegionsMask, RegionCode, center, classify, intersects, rect, union } from '../src/index.js';
import { Box, World, box, boxPredicate } from './fixtures.js';

describe('Rect', () => {
	it('builds from position and size', () => {
		expect(rect(10, 20, 5, 8)).to.deep.equal({ minX: 10, minY: 20, maxX: 15, maxY: 28 });
		expect(rect(3, 4, 0, 0)).to.deep.equal({ minX: 3, minY: 4, maxX: 3, maxY: 4 });
	});

	it('rejects negative and non-finite sizes', () => {
		expect(() => rect(0, 0, -1, 5)).to.throw(RangeError, 'Rect size must not be negative (got -1 x 5)');
		expect(() => rect(0, Number.NaN, 1, 1)).to.throw(RangeError, 'Rect components must be finite');
		expect(() => rect(0, 0, Infinity, 1)).to.throw(RangeError);
	});

	it('intersects inclusively, symmetrically', () => {
		const a = rect(0, 0, 10, 10);
		const touching = rect(10, 10, 5, 5);
		const apart = rect(11, 0, 5, 5);
		expect(intersects(a, touching)).to.be.true;
		expect(intersects(touching, a)).to.be.true;
		expect(intersects(a, apart)).to.be.false;
		expect(intersects(apart, a)).to.be.false;
	});

	it('unions and centers', () => {
		expect(union(rect(0, 0, 10, 10), rect(-5, 5, 2, 20))).to.deep.equal({ minX: -5, minY: 0, maxX: 10, maxY: 25 });
		expect(center(rect(10, 20, 10, 40))).to.deep.equal([15, 40]);
	});
});

describe('RectPredicate', () => {
	it('uses the unit box as the nil region', () => {
		expect(boxPredicate().nilCompare()).to.deep.equal({ minX: 0, minY: 0, maxX: 1, maxY: 1 });
	});

	it('builds the root region from the data and the world', () => {
		const withWorld = boxPredicate();
		const noWorld = boxPredicate({});
		const values = new Set([box('a', 10, 10, 5, 5), box('b', 120, -10, 5, 5)]);

		expect(noWorld.buildRegionFromData(new Set<Box>())).to.deep.equal(noWorld.nilCompare());
		const empty = withWorld.buildRegionFromData(new Set<Box>());
		expect(empty).to.deep.equal(World);
		expect(empty).to.not.equal(World);
		expect(noWorld.buildRegionFromData(values)).to.deep.equal({ minX: 10, minY: -10, maxX: 125, maxY: 15 });
		expect(withWorld.buildRegionFromData(values)).to.deep.equal({ minX: 0, minY: -10, maxX: 125, maxY: 100 });
	});

	it('splits a region into equal quadrants, upper meaning smaller y', () => {
		const quadrants = boxPredicate().buildQuadrantsFromData(rect(0, 0, 100, 60));
		expect(quadrants[RegionCode.UpperLeft]).to.deep.equal({ minX: 0, minY: 0, maxX: 50, maxY: 30 });
		expect(quadrants[RegionCode.UpperRight]).to.deep.equal({ minX: 50, minY: 0, maxX: 100, maxY: 30 });
		expect(quadrants[RegionCode.LowerLeft]).to.deep.equal({ minX: 0, minY: 30, maxX: 50, maxY: 60 });
		expect(quadrants[RegionCode.LowerRight]).to.deep.equal({ minX: 50, minY: 30, maxX: 100, maxY: 60 });
	});

	it('classifies values into every quadrant they touch', () => {
		const predicate = boxPredicate();
		const quadrants = predicate.buildQuadrantsFromData(World);
		expect(classify(predicate, quadrants, box('a', 10, 10, 5, 5))).to.equal(RegionCode.UpperLeft);
		expect(classify(predicate, quadrants, box('wide', 10, 60, 80, 5))).to.equal(RegionCode.LowerLeft | RegionCode.LowerRight);
		expect(classify(predicate, quadrants, box('middle', 45, 45, 10, 10))).to.equal(AllRegionsMask);
		expect(classify(predicate, quadrants, box('away', 200, 200, 1, 1))).to.equal(0);
	});
});
