import {
	matchStrings,
	queryIsCaseSensitive,
	scoreMatch,
	startsAtWordBoundary,
	unscoredMatches,
} from '../src/fuzzyMatcher';
import { inlineScheduler, ManualScheduler } from './mocks/scheduler';

const candidates = (...labels: string[]) =>
	labels.map((string, id) => ({ id, string }));

describe('queryIsCaseSensitive', () => {
	it('is case-sensitive only when the query has an uppercase letter', () => {
		expect(queryIsCaseSensitive('creat')).toBe(false);
		expect(queryIsCaseSensitive('Creat')).toBe(true);
		expect(queryIsCaseSensitive('a_1')).toBe(false);
	});
});

describe('scoreMatch', () => {
	it('gives a full score to a contiguous prefix', () => {
		expect(scoreMatch('CreateComponent', 'Creat', true)).toEqual({
			score: 1,
			positions: [0, 1, 2, 3, 4],
		});
	});

	it('returns null when a query character cannot be placed', () => {
		expect(scoreMatch('create_all', 'Creat', true)).toBeNull();
		expect(scoreMatch('abc', 'abcd', false)).toBeNull();
	});

	it('prefers word starts over mid-word characters', () => {
		expect(scoreMatch('CreateComponent', 'cc', false)).toEqual({
			score: 0.8,
			positions: [0, 6],
		});
	});

	it('penalises a first character that is not at a word start', () => {
		const result = scoreMatch('CreateComponent', 'reat', false);
		expect(result?.positions).toEqual([1, 2, 3, 4]);
		expect(result?.score).toBeCloseTo(0.6);
	});

	it('penalises gaps between later characters by distance', () => {
		// "a" at 0 scores 1, "d" after a gap of two scores 0.6 - 0.1
		const result = scoreMatch('abcd', 'ad', false);
		expect(result?.positions).toEqual([0, 3]);
		expect(result?.score).toBeCloseTo(0.5);
	});

	it('scores an empty query as zero with no positions', () => {
		expect(scoreMatch('anything', '', false)).toEqual({ score: 0, positions: [] });
	});

	it('ignores case for labels whose lowercase form is longer', () => {
		expect(scoreMatch('FooBarİ', 'foo', false)).toEqual({ score: 1, positions: [0, 1, 2] });
		const result = scoreMatch('İstanbul', 'stan', false);
		expect(result?.positions).toEqual([1, 2, 3, 4]);
		expect(result?.score).toBeCloseTo(0.6);
	});

	it('reports positions as offsets past astral characters', () => {
		const result = scoreMatch('a😀b', 'ab', false);
		expect(result?.positions).toEqual([0, 3]);
		expect(result?.score).toBeCloseTo(0.55);
	});
});

describe('startsAtWordBoundary', () => {
	it('accepts a query starting at any word of the label', () => {
		expect(startsAtWordBoundary('create_all', 'al', false)).toBe(true);
		expect(startsAtWordBoundary('CreateComponent', 'comp', false)).toBe(true);
	});

	it('rejects a query whose first character only appears mid-word', () => {
		expect(startsAtWordBoundary('CreateComponent', 'reat', false)).toBe(false);
	});

	it('compares exactly when case-sensitive', () => {
		expect(startsAtWordBoundary('create_all', 'Creat', true)).toBe(false);
		expect(startsAtWordBoundary('CreateComponent', 'Creat', true)).toBe(true);
	});

	it('rejects underscore-prefixed words for a letter query', () => {
		expect(startsAtWordBoundary('_private', 'p', false)).toBe(false);
		expect(startsAtWordBoundary('_private', '_p', false)).toBe(true);
	});
});

describe('matchStrings', () => {
	it('sorts by score then candidate id and drops non-matches', async () => {
		const result = await matchStrings(
			candidates('xay', 'ab', 'zzz', 'abc'),
			'a',
			{ caseSensitive: false, limit: 100, scheduler: inlineScheduler }
		);
		expect(result.map((match) => match.candidateId)).toEqual([1, 3, 0]);
		expect(result.map((match) => match.score)).toEqual([1, 1, 0.6]);
	});

	it('caps results at the limit', async () => {
		const result = await matchStrings(
			candidates('a1', 'a2', 'a3'),
			'a',
			{ caseSensitive: false, limit: 2, scheduler: inlineScheduler }
		);
		expect(result.map((match) => match.string)).toEqual(['a1', 'a2']);
	});

	it('yields to the scheduler once per chunk', async () => {
		const scheduler = { yield: jest.fn(() => Promise.resolve()) };
		await matchStrings(candidates('a', 'b', 'c', 'd', 'e'), 'a', {
			caseSensitive: false,
			limit: 10,
			scheduler,
			chunkSize: 2,
		});
		expect(scheduler.yield).toHaveBeenCalledTimes(3);
	});

	it('returns nothing when cancelled while suspended', async () => {
		const scheduler = new ManualScheduler();
		let cancelled = false;
		const pending = matchStrings(candidates('abc'), 'a', {
			caseSensitive: false,
			limit: 10,
			scheduler,
			isCancelled: () => cancelled,
		});
		cancelled = true;
		scheduler.release(0);
		await expect(pending).resolves.toEqual([]);
	});
});

describe('unscoredMatches', () => {
	it('keeps source order with zero scores', () => {
		expect(unscoredMatches(candidates('b', 'a'))).toEqual([
			{ candidateId: 0, score: 0, positions: [], string: 'b' },
			{ candidateId: 1, score: 0, positions: [], string: 'a' },
		]);
	});
});
