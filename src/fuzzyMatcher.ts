import type { StringMatch, StringMatchCandidate } from "./types";
import { splitWords } from "./utils/wordSplitter";

/**
 * Cooperative scheduler the matcher yields to between chunks of work.
 */
export interface BackgroundScheduler {
	yield(): Promise<void>;
}

export const immediateScheduler: BackgroundScheduler = {
	yield: () => new Promise<void>((resolve) => setImmediate(resolve)),
};

export interface MatchStringsOptions {
	caseSensitive: boolean;
	limit: number;
	scheduler: BackgroundScheduler;
	isCancelled?: () => boolean;
	chunkSize?: number;
}

export const DEFAULT_MATCH_LIMIT = 100;
const DEFAULT_CHUNK_SIZE = 256;

const BASE_DISTANCE_PENALTY = 0.6;
const ADDITIONAL_DISTANCE_PENALTY = 0.05;
const MIN_DISTANCE_PENALTY = 0.2;

export const queryIsCaseSensitive = (query: string): boolean =>
	Array.from(query).some(
		(char) => char !== char.toLowerCase() && char === char.toUpperCase()
	);

const isDigit = (char: string): boolean => char >= "0" && char <= "9";
const isLower = (char: string): boolean =>
	char !== char.toUpperCase() && char === char.toLowerCase();
const isUpper = (char: string): boolean =>
	char !== char.toLowerCase() && char === char.toUpperCase();

/** One code point of a label with its UTF-16 offset. */
interface LabelChar {
	char: string;
	folded: string;
	offset: number;
}

const toLabelChars = (text: string, caseSensitive: boolean): LabelChar[] => {
	const chars: LabelChar[] = [];
	let offset = 0;
	for (const char of text) {
		chars.push({ char, folded: caseSensitive ? char : char.toLowerCase(), offset });
		offset += char.length;
	}
	return chars;
};

/**
 * Weight of matching a query character at code point `index`, given where
 * the previous query character matched (-1 for none).
 */
const charScore = (
	chars: readonly LabelChar[],
	index: number,
	previousMatch: number,
	queryIndex: number
): number => {
	if (index === 0 || index === previousMatch + 1) {
		return 1;
	}
	const last = chars[index - 1]?.char ?? "";
	const current = chars[index]?.char ?? "";
	if (last === "/") return 0.9;
	if (
		last === "-" ||
		last === "_" ||
		last === " " ||
		isDigit(last) ||
		(isLower(last) && isUpper(current))
	) {
		return 0.8;
	}
	if (last === ".") return 0.7;
	if (queryIndex === 0) return BASE_DISTANCE_PENALTY;
	const gap = index - previousMatch - 1;
	return Math.max(
		MIN_DISTANCE_PENALTY,
		BASE_DISTANCE_PENALTY - gap * ADDITIONAL_DISTANCE_PENALTY
	);
};

interface Alignment {
	score: number;
	positions: number[];
}

/**
 * Best alignment of `query` inside `text`, or null when some query
 * character cannot be placed in order. Case is folded per code point;
 * positions are UTF-16 offsets into `text`.
 */
export function scoreMatch(
	text: string,
	query: string,
	caseSensitive: boolean
): Alignment | null {
	if (query.length === 0) {
		return { score: 0, positions: [] };
	}
	const chars = toLabelChars(text, caseSensitive);
	const pattern = toLabelChars(query, caseSensitive).map(({ folded }) => folded);

	const memo = new Map<number, Alignment | null>();
	const width = chars.length + 1;

	const search = (queryIndex: number, previousMatch: number): Alignment | null => {
		if (queryIndex === pattern.length) {
			return { score: 1, positions: [] };
		}
		const key = queryIndex * width + previousMatch + 1;
		const cached = memo.get(key);
		if (cached !== undefined) {
			return cached;
		}

		const remaining = pattern.length - queryIndex - 1;
		let best: Alignment | null = null;
		for (let index = previousMatch + 1; index < chars.length - remaining; index++) {
			const candidate = chars[index];
			if (!candidate || candidate.folded !== pattern[queryIndex]) continue;
			const rest = search(queryIndex + 1, index);
			if (!rest) continue;
			const score = charScore(chars, index, previousMatch, queryIndex) * rest.score;
			if (!best || score > best.score) {
				best = { score, positions: [candidate.offset, ...rest.positions] };
			}
		}
		memo.set(key, best);
		return best;
	};

	return search(0, -1);
}

/**
 * True when the first character of `query` starts some word of `text`.
 * Compared exactly in case-sensitive mode and lowercased otherwise.
 */
export const startsAtWordBoundary = (
	text: string,
	query: string,
	caseSensitive: boolean
): boolean => {
	const [queryStart] = Array.from(query);
	if (queryStart === undefined) return true;
	const fold = (value: string): string =>
		caseSensitive ? value : value.toLowerCase();
	const start = fold(queryStart);
	return splitWords(text).some((word) => fold(word).startsWith(start));
};

const compareMatches = (left: StringMatch, right: StringMatch): number => {
	if (left.score !== right.score) {
		return right.score - left.score;
	}
	return left.candidateId - right.candidateId;
};

/**
 * Fuzzy-match `candidates` against a non-empty `query`. Results are sorted
 * by descending score then candidate id and capped at `limit`.
 */
export async function matchStrings(
	candidates: readonly StringMatchCandidate[],
	query: string,
	options: MatchStringsOptions
): Promise<StringMatch[]> {
	const chunkSize = Math.max(1, options.chunkSize ?? DEFAULT_CHUNK_SIZE);
	const matches: StringMatch[] = [];

	for (let start = 0; start < candidates.length; start += chunkSize) {
		await options.scheduler.yield();
		if (options.isCancelled?.()) {
			return [];
		}
		for (const candidate of candidates.slice(start, start + chunkSize)) {
			const alignment = scoreMatch(candidate.string, query, options.caseSensitive);
			if (!alignment) continue;
			matches.push({
				candidateId: candidate.id,
				score: alignment.score,
				positions: alignment.positions,
				string: candidate.string,
			});
		}
	}

	matches.sort(compareMatches);
	return matches.slice(0, Math.max(0, options.limit));
}

/**
 * Every candidate in source order, unscored.
 */
export const unscoredMatches = (
	candidates: readonly StringMatchCandidate[]
): StringMatch[] =>
	candidates.map((candidate) => ({
		candidateId: candidate.id,
		score: 0,
		positions: [],
		string: candidate.string,
	}));
