import type { Completion, CompletionKind, StringMatch } from "./types";
import { filterText } from "./completionStore";

/** Matches scoring at or above this are ranked by score before sort text. */
export const STRONG_MATCH_THRESHOLD = 0.2;

export type MatchBucket = "strong" | "weak";

export const matchBucket = (score: number): MatchBucket =>
	score >= STRONG_MATCH_THRESHOLD ? "strong" : "weak";

const KIND_PRIORITY: Record<CompletionKind, number> = {
	keyword: 0,
	variable: 1,
	other: 2,
};

interface RankedMatch {
	match: StringMatch;
	bucket: MatchBucket;
	sortText: string | undefined;
	kindPriority: number;
	filterText: string;
}

const compareOrdinal = (left: string, right: string): number => {
	if (left === right) return 0;
	return left < right ? -1 : 1;
};

// Absent sort text goes after every present one.
const compareSortText = (left: string | undefined, right: string | undefined): number => {
	if (left === right) return 0;
	if (left === undefined) return 1;
	if (right === undefined) return -1;
	return compareOrdinal(left, right);
};

const compareScoreDescending = (left: number, right: number): number =>
	left === right ? 0 : right - left;

const compareTieBreak = (left: RankedMatch, right: RankedMatch): number =>
	left.kindPriority - right.kindPriority ||
	compareOrdinal(left.filterText, right.filterText) ||
	left.match.candidateId - right.match.candidateId;

const compareRanked = (left: RankedMatch, right: RankedMatch): number => {
	if (left.bucket !== right.bucket) {
		return left.bucket === "strong" ? -1 : 1;
	}
	if (left.bucket === "strong") {
		return (
			compareScoreDescending(left.match.score, right.match.score) ||
			compareSortText(left.sortText, right.sortText) ||
			compareTieBreak(left, right)
		);
	}
	return (
		compareSortText(left.sortText, right.sortText) ||
		compareScoreDescending(left.match.score, right.match.score) ||
		compareTieBreak(left, right)
	);
};

/**
 * Order matches so obvious textual hits lead, while ambiguous ones follow
 * the provider's sort text.
 */
export const rankCompletionMatches = (
	matches: readonly StringMatch[],
	lookup: (candidateId: number) => Completion | undefined
): StringMatch[] => {
	const ranked: RankedMatch[] = matches.map((match) => {
		const completion = lookup(match.candidateId);
		return {
			match,
			bucket: matchBucket(match.score),
			sortText: completion?.sortText,
			kindPriority: KIND_PRIORITY[completion?.kind ?? "other"],
			filterText: completion ? filterText(completion) : match.string,
		};
	});
	return ranked.sort(compareRanked).map((entry) => entry.match);
};
