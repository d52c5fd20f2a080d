export {
	FuzzyMatcher,
	type Candidate,
	type MatcherSettings,
	type RecordLocation,
	type RecordMatch,
	type VersionFailure,
	type VersionMatch,
	type VersionSelection,
} from "./FuzzyMatcher"
export {
	exactLineComparator,
	getLineComparator,
	levenshteinLineComparator,
	trimmedLineComparator,
	type LineComparator,
} from "./line-comparators"
